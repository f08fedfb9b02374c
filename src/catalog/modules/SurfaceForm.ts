import type {
  BoilerFormInput,
  MeasurementInput,
  SurfaceFormInput,
  SurfaceSubmission,
} from '../../contracts/CatalogApiV1';
import type { Boiler, Catalog, FormResult, Surface } from '../schema/CatalogV1';

// ─── Field normalisation ──────────────────────────────────────────────────────

/** Trimmed text, or null when nothing was entered. */
export function cleanText(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/** Comma-separated alias entry → trimmed, non-empty names. */
export function parseAliases(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(alias => alias.trim())
    .filter(alias => alias !== '');
}

/**
 * Parses a measurement field.  Zero and blank both mean "not provided" and
 * become null; a comma decimal separator is accepted.
 */
export function parseMeasurement(label: string, value: MeasurementInput | undefined): FormResult<number | null> {
  if (value === null || value === undefined) return { ok: true, value: null };

  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else {
    const trimmed = value.trim().replace(',', '.');
    if (trimmed === '') return { ok: true, value: null };
    numeric = Number(trimmed);
  }

  if (!Number.isFinite(numeric)) return { ok: false, error: `${label} must be a number` };
  if (numeric < 0) return { ok: false, error: `${label} cannot be negative` };
  return { ok: true, value: numeric > 0 ? numeric : null };
}

// ─── Record builders ──────────────────────────────────────────────────────────

export function buildSurfacePayload(input: SurfaceFormInput): FormResult<Surface> {
  const name = cleanText(input.name);
  if (name === null) return { ok: false, error: 'Enter the surface name' };

  const pressure = parseMeasurement('Pressure', input.pressure);
  if (!pressure.ok) return pressure;
  const temperature = parseMeasurement('Temperature', input.temperature);
  if (!temperature.ok) return temperature;
  const outerDiameter = parseMeasurement('Outer diameter', input.outerDiameter);
  if (!outerDiameter.ok) return outerDiameter;
  const wallThickness = parseMeasurement('Wall thickness', input.wallThickness);
  if (!wallThickness.ok) return wallThickness;

  return {
    ok: true,
    value: {
      name,
      aliases: parseAliases(input.aliases),
      steel: cleanText(input.steel),
      pressure: pressure.value,
      temperature: temperature.value,
      outerDiameter: outerDiameter.value,
      wallThickness: wallThickness.value,
      loadCondition: cleanText(input.loadCondition),
      category: cleanText(input.category),
      system: cleanText(input.system),
      section: cleanText(input.section),
      surface_group: cleanText(input.surfaceGroup),
      notes: cleanText(input.notes),
    },
  };
}

/**
 * Builds a new boiler record.  Optional fields left blank are omitted from
 * the stored record rather than written as null.
 */
export function buildBoilerRecord(input: BoilerFormInput, catalog: Catalog): FormResult<Boiler> {
  const id = cleanText(input.id);
  if (id === null) return { ok: false, error: 'Enter the ID of the new boiler' };
  if (catalog.boilers.some(boiler => boiler.id === id)) {
    return { ok: false, error: `Boiler "${id}" already exists; pick it from the list instead` };
  }

  const boiler: Boiler = { id, surfaces: [] };
  const name = cleanText(input.name);
  const station = cleanText(input.station);
  const boilerType = cleanText(input.boilerType);
  const location = cleanText(input.location);
  const parameters = cleanText(input.parameters);
  const notes = cleanText(input.notes);
  if (name !== null) boiler.name = name;
  if (station !== null) boiler.station = station;
  if (boilerType !== null) boiler.boilerType = boilerType;
  if (location !== null) boiler.location = location;
  if (parameters !== null) boiler.parameters = parameters;
  if (notes !== null) boiler.notes = notes;
  return { ok: true, value: boiler };
}

// ─── Submission ───────────────────────────────────────────────────────────────

/**
 * Validates a form submission and appends it to `catalog` in place.
 * A surface name may appear only once per boiler.  On failure the catalog is
 * left untouched.
 */
export function applySurfaceSubmission(catalog: Catalog, submission: SurfaceSubmission): FormResult<string> {
  const surface = buildSurfacePayload(submission.surface);
  if (!surface.ok) return surface;

  const { target } = submission;
  if (target.kind === 'new') {
    const boiler = buildBoilerRecord(target.boiler, catalog);
    if (!boiler.ok) return boiler;
    boiler.value.surfaces.push(surface.value);
    catalog.boilers.push(boiler.value);
    return { ok: true, value: `Added boiler "${boiler.value.id}" with surface "${surface.value.name}"` };
  }

  const { boilerId } = target;
  const existing = catalog.boilers.find(boiler => boiler.id === boilerId);
  if (existing === undefined) {
    return { ok: false, error: `Boiler "${boilerId}" was not found` };
  }
  if (existing.surfaces.some(stored => stored.name === surface.value.name)) {
    return { ok: false, error: `Surface "${surface.value.name}" already exists on boiler "${existing.id}"` };
  }
  existing.surfaces.push(surface.value);
  return { ok: true, value: `Added surface "${surface.value.name}" to boiler "${existing.id}"` };
}
