import { describe, it, expect } from 'vitest';
import { flattenSurfaces, SURFACE_COLUMNS } from '../modules/SurfaceFlattener';
import { sampleCatalog } from './fixtures';

describe('SurfaceFlattener – row counts', () => {
  it('emits one row per surface, or one per component when a surface has them', () => {
    const rows = flattenSurfaces(sampleCatalog());
    expect(rows).toHaveLength(5);
  });

  it('yields N-1+2 rows for a boiler with N surfaces where one has 2 components', () => {
    const catalog = sampleCatalog();
    const boiler = catalog.boilers[0];
    const rows = flattenSurfaces({ boilers: [boiler] });
    expect(boiler.surfaces).toHaveLength(3);
    expect(rows).toHaveLength(3 - 1 + 2);
  });

  it('returns no rows for an empty catalog', () => {
    expect(flattenSurfaces({ boilers: [] })).toEqual([]);
  });

  it('treats an empty components list like no components', () => {
    const rows = flattenSurfaces({ boilers: [{ id: 'K-1', surfaces: [{ name: 'ПП', components: [] }] }] });
    expect(rows).toHaveLength(1);
    expect(rows[0].component).toBeNull();
  });
});

describe('SurfaceFlattener – surface rows', () => {
  it('merges boiler and surface fields', () => {
    const [row] = flattenSurfaces(sampleCatalog());
    expect(row).toEqual({
      boiler_id: 'TGM-84-1',
      boiler_name: 'ТГМ-84 ст. №1',
      station: 'StationA',
      boiler_type: 'ТГМ-84',
      location: 'Main building',
      surface: 'Пароперегреватель',
      aliases: 'ПП, SH',
      component: null,
      category: 'Superheater',
      system: 'Steam',
      section: 'Convective',
      surface_group: null,
      steel: '12Х1МФ',
      pressure: 14,
      temperature: 545,
      outer_diameter: 32,
      wall_thickness: 4,
      load_condition: '',
      notes: '',
    });
  });

  it('produces every column in the fixed column order', () => {
    const [row] = flattenSurfaces(sampleCatalog());
    expect(Object.keys(row)).toEqual([...SURFACE_COLUMNS]);
  });

  it('uses an empty alias string when there are no aliases', () => {
    const rows = flattenSurfaces(sampleCatalog());
    expect(rows[4].aliases).toBe('');
    expect(rows[4].location).toBeNull();
  });
});

describe('SurfaceFlattener – component rows', () => {
  it('overrides leaf fields from the component', () => {
    const rows = flattenSurfaces(sampleCatalog());
    const header = rows[1];
    expect(header.surface).toBe('Экономайзер');
    expect(header.component).toBe('Inlet header');
    expect(header.outer_diameter).toBe(219);
    expect(header.wall_thickness).toBe(16);
  });

  it('falls back to the surface value when the component leaves a field out', () => {
    const rows = flattenSurfaces(sampleCatalog());
    const header = rows[1];
    expect(header.steel).toBe('Ст20');
    expect(header.pressure).toBe(15.5);
    expect(header.temperature).toBe(280);
    expect(header.section).toBeNull();
    expect(header.notes).toBe('');
  });

  it('keeps boiler and surface context on each component row', () => {
    const rows = flattenSurfaces(sampleCatalog());
    const coils = rows[2];
    expect(coils.component).toBe('Coils');
    expect(coils.boiler_id).toBe('TGM-84-1');
    expect(coils.station).toBe('StationA');
    expect(coils.category).toBe('Economizer');
    expect(coils.steel).toBe('20');
    expect(coils.outer_diameter).toBe(28);
  });

  it('treats a null component value as absent', () => {
    const rows = flattenSurfaces({
      boilers: [{
        id: 'K-1',
        surfaces: [{ name: 'ПП', steel: '12Х1МФ', components: [{ description: 'Outlet', steel: null }] }],
      }],
    });
    expect(rows[0].steel).toBe('12Х1МФ');
  });
});
