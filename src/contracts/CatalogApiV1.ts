/** Mount point of the catalog API on the dev/preview server. */
export const CATALOG_API_BASE = '/api/catalog';

// ─── Form submission ──────────────────────────────────────────────────────────

/** Numeric form fields arrive as typed numbers or as raw text ("12,5"). */
export type MeasurementInput = string | number | null;

export interface SurfaceFormInput {
  name: string;
  /** Comma-separated alternative names. */
  aliases?: string;
  steel?: string;
  pressure?: MeasurementInput;
  temperature?: MeasurementInput;
  outerDiameter?: MeasurementInput;
  wallThickness?: MeasurementInput;
  loadCondition?: string;
  category?: string;
  system?: string;
  section?: string;
  surfaceGroup?: string;
  notes?: string;
}

export interface BoilerFormInput {
  id: string;
  name?: string;
  station?: string;
  boilerType?: string;
  location?: string;
  parameters?: string;
  notes?: string;
}

export type SurfaceTarget =
  | { kind: 'existing'; boilerId: string }
  | { kind: 'new'; boiler: BoilerFormInput };

export interface SurfaceSubmission {
  target: SurfaceTarget;
  surface: SurfaceFormInput;
}

// ─── Outcomes ─────────────────────────────────────────────────────────────────

export type OutcomeLevel = 'success' | 'info' | 'warning' | 'error';

/** User-facing result of a write operation. */
export interface CatalogOutcome {
  level: OutcomeLevel;
  message: string;
  added?: number;
  skipped?: number;
}

export interface ApiErrorBody {
  error: string;
}
