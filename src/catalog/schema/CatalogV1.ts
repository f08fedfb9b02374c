// ─── Persisted document ───────────────────────────────────────────────────────

/**
 * A measured value as stored in the catalog.  Form entry always produces a
 * number; imported reference data sometimes carries ranges such as "540/545",
 * which are kept verbatim.
 */
export type Measurement = number | string;

export type BoilerParameters = string | Record<string, string | number | null>;

export interface Component {
  description?: string | null;
  section?: string | null;
  steel?: string | null;
  pressure?: Measurement | null;        // MPa
  temperature?: Measurement | null;     // °C
  outerDiameter?: Measurement | null;   // mm
  wallThickness?: Measurement | null;   // mm
  notes?: string | null;
}

export interface Surface {
  /** Identity of the surface within its boiler. */
  name: string;
  aliases?: string[];
  steel?: string | null;
  pressure?: Measurement | null;        // MPa
  temperature?: Measurement | null;     // °C
  outerDiameter?: Measurement | null;   // mm
  wallThickness?: Measurement | null;   // mm
  /** Load at which the parameters apply, e.g. "100%". */
  loadCondition?: string | null;
  notes?: string | null;
  category?: string | null;
  system?: string | null;
  section?: string | null;
  surface_group?: string | null;
  components?: Component[];
}

export interface Boiler {
  id: string;
  name?: string | null;
  station?: string | null;
  boilerType?: string | null;
  location?: string | null;
  notes?: string | null;
  parameters?: BoilerParameters | null;
  surfaces: Surface[];
}

export interface Catalog {
  boilers: Boiler[];
}

/** Uploaded fragments may omit the fields the catalog treats as identity. */
export interface UploadedSurface extends Omit<Surface, 'name'> {
  name?: string | null;
}

export interface UploadedBoiler extends Omit<Boiler, 'id' | 'surfaces'> {
  id?: string | null;
  surfaces: UploadedSurface[];
}

export interface UploadedCatalog {
  boilers: UploadedBoiler[];
}

// ─── Flattened rows ───────────────────────────────────────────────────────────

export type RowValue = string | number | null;

export interface SurfaceRow {
  boiler_id: string;
  boiler_name: string | null;
  station: string | null;
  boiler_type: string | null;
  location: string | null;
  surface: string;
  aliases: string;
  /** Component description; null on surface-level rows. */
  component: string | null;
  category: string | null;
  system: string | null;
  section: string | null;
  surface_group: string | null;
  steel: string | null;
  pressure: Measurement | null;
  temperature: Measurement | null;
  outer_diameter: Measurement | null;
  wall_thickness: Measurement | null;
  load_condition: string;
  notes: string;
}

export type SurfaceColumn = keyof SurfaceRow;

// ─── Filtering ────────────────────────────────────────────────────────────────

export type FilterDimension = 'station' | 'boiler_type' | 'steel' | 'category' | 'system';

export type FilterSelections = Partial<Record<FilterDimension, readonly string[]>>;

export type FilterOptions = Record<FilterDimension, string[]>;

// ─── Results ──────────────────────────────────────────────────────────────────

export type FormResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface MergeResult {
  /** Boilers plus surfaces appended to the catalog. */
  added: number;
  /** Incoming boilers without an id and surfaces without a name. */
  skipped: number;
}

export interface StationSummary {
  station: string;
  boilers: number;
  surfaces: number;
}

export interface CatalogSummary {
  boilerCount: number;
  surfaceCount: number;
  componentCount: number;
  rowCount: number;
  stations: StationSummary[];
}
