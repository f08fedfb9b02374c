import type {
  FilterDimension,
  FilterOptions,
  FilterSelections,
  SurfaceRow,
} from '../schema/CatalogV1';

export const FILTER_DIMENSIONS: readonly FilterDimension[] = [
  'station',
  'boiler_type',
  'steel',
  'category',
  'system',
];

/**
 * Case-insensitive substring search across every non-null value of a record.
 * Array values are joined with spaces before comparison.
 */
export function matchQuery(item: object, query: string): boolean {
  const needle = query.toLowerCase();
  const values: unknown[] = Object.values(item);
  for (const value of values) {
    if (value === null || value === undefined) continue;
    const haystack = Array.isArray(value) ? value.map(String).join(' ') : String(value);
    if (haystack.toLowerCase().includes(needle)) return true;
  }
  return false;
}

/**
 * Keeps rows whose value is selected on every dimension that has a selection.
 * An empty selection leaves its dimension unfiltered.
 */
export function filterRows(rows: readonly SurfaceRow[], selections: FilterSelections): SurfaceRow[] {
  const active = FILTER_DIMENSIONS.flatMap(dimension => {
    const selected = selections[dimension];
    return selected && selected.length > 0 ? [{ dimension, allowed: new Set(selected) }] : [];
  });
  if (active.length === 0) return [...rows];

  return rows.filter(row =>
    active.every(({ dimension, allowed }) => {
      const value = row[dimension];
      return value !== null && allowed.has(value);
    }),
  );
}

/** Blank query keeps every row; filters apply afterwards. */
export function searchRows(
  rows: readonly SurfaceRow[],
  query: string,
  selections: FilterSelections = {},
): SurfaceRow[] {
  const trimmed = query.trim();
  const matched = trimmed === '' ? rows : rows.filter(row => matchQuery(row, trimmed));
  return filterRows(matched, selections);
}

/** Distinct non-empty values per filter dimension, sorted for display. */
export function filterOptions(rows: readonly SurfaceRow[]): FilterOptions {
  const distinct = (dimension: FilterDimension): string[] => {
    const values = new Set<string>();
    for (const row of rows) {
      const value = row[dimension];
      if (value) values.add(value);
    }
    return [...values].sort((a, b) => a.localeCompare(b, 'ru'));
  };
  return {
    station: distinct('station'),
    boiler_type: distinct('boiler_type'),
    steel: distinct('steel'),
    category: distinct('category'),
    system: distinct('system'),
  };
}
