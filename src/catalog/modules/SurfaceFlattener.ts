import type {
  Boiler,
  Catalog,
  Component,
  Surface,
  SurfaceColumn,
  SurfaceRow,
} from '../schema/CatalogV1';

/** Table and CSV column order. */
export const SURFACE_COLUMNS: readonly SurfaceColumn[] = [
  'boiler_id',
  'boiler_name',
  'station',
  'boiler_type',
  'location',
  'surface',
  'aliases',
  'component',
  'category',
  'system',
  'section',
  'surface_group',
  'steel',
  'pressure',
  'temperature',
  'outer_diameter',
  'wall_thickness',
  'load_condition',
  'notes',
];

export const COLUMN_LABELS: Record<SurfaceColumn, string> = {
  boiler_id: 'Boiler ID',
  boiler_name: 'Boiler',
  station: 'Station',
  boiler_type: 'Boiler type',
  location: 'Location',
  surface: 'Surface',
  aliases: 'Aliases',
  component: 'Component',
  category: 'Category',
  system: 'System',
  section: 'Section',
  surface_group: 'Surface group',
  steel: 'Steel grade',
  pressure: 'Pressure, MPa',
  temperature: 'Temperature, °C',
  outer_diameter: 'Outer Ø, mm',
  wall_thickness: 'Wall, mm',
  load_condition: 'Load',
  notes: 'Notes',
};

function orNull<T>(value: T | null | undefined): T | null {
  return value ?? null;
}

/** Component value when present, otherwise the owning surface's value. */
function inherit<T>(own: T | null | undefined, fallback: T | null | undefined): T | null {
  return own ?? fallback ?? null;
}

function surfaceRow(boiler: Boiler, surface: Surface): SurfaceRow {
  return {
    boiler_id: boiler.id,
    boiler_name: orNull(boiler.name),
    station: orNull(boiler.station),
    boiler_type: orNull(boiler.boilerType),
    location: orNull(boiler.location),
    surface: surface.name,
    aliases: surface.aliases && surface.aliases.length > 0 ? surface.aliases.join(', ') : '',
    component: null,
    category: orNull(surface.category),
    system: orNull(surface.system),
    section: orNull(surface.section),
    surface_group: orNull(surface.surface_group),
    steel: orNull(surface.steel),
    pressure: orNull(surface.pressure),
    temperature: orNull(surface.temperature),
    outer_diameter: orNull(surface.outerDiameter),
    wall_thickness: orNull(surface.wallThickness),
    load_condition: surface.loadCondition ?? '',
    notes: surface.notes ?? '',
  };
}

function componentRow(base: SurfaceRow, surface: Surface, component: Component): SurfaceRow {
  return {
    ...base,
    component: orNull(component.description),
    section: inherit(component.section, surface.section),
    steel: inherit(component.steel, surface.steel),
    pressure: inherit(component.pressure, surface.pressure),
    temperature: inherit(component.temperature, surface.temperature),
    outer_diameter: inherit(component.outerDiameter, surface.outerDiameter),
    wall_thickness: inherit(component.wallThickness, surface.wallThickness),
    notes: inherit(component.notes, surface.notes) ?? '',
  };
}

/**
 * Expands boiler → surfaces → components into table rows.
 *
 * A surface with components contributes one row per component instead of its
 * own row; component rows keep the boiler and surface context.
 */
export function flattenSurfaces(catalog: Catalog): SurfaceRow[] {
  const rows: SurfaceRow[] = [];
  for (const boiler of catalog.boilers) {
    for (const surface of boiler.surfaces) {
      const base = surfaceRow(boiler, surface);
      const components = surface.components ?? [];
      if (components.length === 0) {
        rows.push(base);
        continue;
      }
      for (const component of components) {
        rows.push(componentRow(base, surface, component));
      }
    }
  }
  return rows;
}
