import type { RowValue, SurfaceColumn, SurfaceRow } from '../schema/CatalogV1';
import { SURFACE_COLUMNS } from './SurfaceFlattener';

const NEEDS_QUOTING = /[",\r\n]/;

/** Byte order mark so spreadsheet tools read the file as UTF-8. */
export const UTF8_BOM = '\uFEFF';

export function escapeCsvValue(value: RowValue): string {
  if (value === null) return '';
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header line of column keys, then one line per row. */
export function toCsv(rows: readonly SurfaceRow[], columns: readonly SurfaceColumn[] = SURFACE_COLUMNS): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map(column => escapeCsvValue(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/** CSV text for a downloaded file: `toCsv` output behind a UTF-8 byte order mark. */
export function toCsvFile(rows: readonly SurfaceRow[], columns: readonly SurfaceColumn[] = SURFACE_COLUMNS): string {
  return UTF8_BOM + toCsv(rows, columns);
}
