import type {
  Boiler,
  Catalog,
  FormResult,
  MergeResult,
  Surface,
  UploadedCatalog,
  UploadedSurface,
} from '../schema/CatalogV1';
import { UploadedCatalogSchema, describeIssue } from '../schema/catalogSchema';

/**
 * Parses the text of an uploaded catalog file.
 *
 * Invalid JSON and JSON without a `boilers` array are both reported as
 * errors; the caller aborts the import without writing anything.
 */
export function parseUploadedCatalog(text: string): FormResult<UploadedCatalog> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Could not read the file: ${reason}` };
  }
  const parsed = UploadedCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `The file is not a boiler catalog (${describeIssue(parsed.error)})` };
  }
  return { ok: true, value: parsed.data };
}

/** Trimmed surface, or null when it has no usable name. */
function namedSurface(surface: UploadedSurface): Surface | null {
  const name = surface.name?.trim() ?? '';
  return name === '' ? null : { ...surface, name };
}

/**
 * Imports an uploaded fragment into `existing`, in place.
 *
 * Ids and surface names are trimmed before matching, the same as form entry.
 * New boiler ids are appended whole.  For a boiler id already in the catalog
 * only surfaces with a name not yet present on that boiler are appended;
 * nothing already stored is modified.  Boilers without an id and surfaces
 * without a name cannot be matched and are skipped.
 */
export function mergeUploadedBoilers(existing: Catalog, incoming: UploadedCatalog): MergeResult {
  let added = 0;
  let skipped = 0;
  const index = new Map<string, Boiler>(existing.boilers.map(boiler => [boiler.id, boiler]));

  for (const candidate of incoming.boilers) {
    const candidateId = candidate.id?.trim() ?? '';
    if (candidateId === '') {
      skipped++;
      continue;
    }

    const named: Surface[] = [];
    for (const surface of candidate.surfaces) {
      const cleaned = namedSurface(surface);
      if (cleaned === null) skipped++;
      else named.push(cleaned);
    }

    const target = index.get(candidateId);
    if (target === undefined) {
      const boiler: Boiler = { ...candidate, id: candidateId, surfaces: named };
      existing.boilers.push(boiler);
      index.set(candidateId, boiler);
      added++;
      continue;
    }

    const knownNames = new Set(target.surfaces.map(surface => surface.name));
    for (const surface of named) {
      if (knownNames.has(surface.name)) continue;
      target.surfaces.push(surface);
      knownNames.add(surface.name);
      added++;
    }
  }

  return { added, skipped };
}
