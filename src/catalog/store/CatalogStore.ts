import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Catalog } from '../schema/CatalogV1';
import { CatalogSchema, describeIssue } from '../schema/catalogSchema';

export interface CatalogStore {
  readonly path: string;
  load(): Catalog;
  save(catalog: Catalog): void;
  /** Deletes the document.  Returns false when there was nothing to delete. */
  remove(): boolean;
}

export function emptyCatalog(): Catalog {
  return { boilers: [] };
}

export function serializeCatalog(catalog: Catalog): string {
  return JSON.stringify(catalog, null, 2);
}

/**
 * Writes through a sibling temp file and rename, so a failed write leaves the
 * previous document in place.
 */
function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** " (boiler "K-1")" for an issue inside a boiler record, else ''. */
function offendingBoiler(raw: unknown, path: ReadonlyArray<string | number>): string {
  const [head, position] = path;
  if (head !== 'boilers' || typeof position !== 'number') return '';
  if (!isRecord(raw) || !Array.isArray(raw.boilers)) return '';
  const boilers: unknown[] = raw.boilers;
  const entry = boilers[position];
  const id = isRecord(entry) ? entry.id : undefined;
  return typeof id === 'string' && id.trim() !== '' ? ` (boiler "${id}")` : ` (boiler #${position + 1})`;
}

/**
 * File-backed catalog: the whole document is read on every `load()` and
 * rewritten on every `save()`.  There is no locking; the last writer wins.
 */
export function createCatalogStore(path: string): CatalogStore {
  return {
    path,

    load() {
      if (!existsSync(path)) return emptyCatalog();

      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Catalog file ${path} is not valid JSON: ${reason}`);
      }

      const parsed = CatalogSchema.safeParse(raw);
      if (!parsed.success) {
        const where = offendingBoiler(raw, parsed.error.issues[0]?.path ?? []);
        throw new Error(`Catalog file ${path} has an unexpected shape: ${describeIssue(parsed.error)}${where}`);
      }
      return parsed.data;
    },

    save(catalog) {
      mkdirSync(dirname(path), { recursive: true });
      writeFileAtomic(path, serializeCatalog(catalog));
    },

    remove() {
      if (!existsSync(path)) return false;
      unlinkSync(path);
      return true;
    },
  };
}
