import type { Catalog, CatalogSummary, StationSummary } from '../schema/CatalogV1';
import { flattenSurfaces } from './SurfaceFlattener';

/** Bucket for boilers with no station recorded. */
export const UNASSIGNED_STATION = '—';

/**
 * Headline counts for the dashboard metric cards and the per-station chart.
 * Stations are ordered by surface count, largest first.
 */
export function summarizeCatalog(catalog: Catalog): CatalogSummary {
  const byStation = new Map<string, StationSummary>();
  let surfaceCount = 0;
  let componentCount = 0;

  for (const boiler of catalog.boilers) {
    const station = boiler.station?.trim() || UNASSIGNED_STATION;
    const entry = byStation.get(station) ?? { station, boilers: 0, surfaces: 0 };
    entry.boilers += 1;
    entry.surfaces += boiler.surfaces.length;
    byStation.set(station, entry);

    surfaceCount += boiler.surfaces.length;
    for (const surface of boiler.surfaces) {
      componentCount += surface.components?.length ?? 0;
    }
  }

  const stations = [...byStation.values()].sort(
    (a, b) => b.surfaces - a.surfaces || a.station.localeCompare(b.station, 'ru'),
  );

  return {
    boilerCount: catalog.boilers.length,
    surfaceCount,
    componentCount,
    rowCount: flattenSurfaces(catalog).length,
    stations,
  };
}
