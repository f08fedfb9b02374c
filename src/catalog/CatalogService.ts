import pc from 'picocolors';
import type { Logger } from 'vite';
import type { CatalogOutcome, SurfaceSubmission } from '../contracts/CatalogApiV1';
import type { Catalog } from './schema/CatalogV1';
import type { CatalogStore } from './store/CatalogStore';
import { applySurfaceSubmission } from './modules/SurfaceForm';
import { mergeUploadedBoilers, parseUploadedCatalog } from './modules/CatalogMerger';

export type CatalogLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

export interface CatalogService {
  getCatalog(): Catalog;
  addSurface(submission: SurfaceSubmission): CatalogOutcome;
  importCatalog(text: string): CatalogOutcome;
  deleteBoiler(boilerId: string): CatalogOutcome;
  deleteSurface(boilerId: string, surfaceName: string): CatalogOutcome;
  deleteCatalog(): CatalogOutcome;
}

/**
 * Catalog operations as seen by the operator.
 *
 * Every call reloads the document, applies one change and saves it.  User
 * mistakes come back as `error`/`warning` outcomes with nothing written;
 * store failures (unreadable file, failed write) are thrown.
 */
export function createCatalogService(store: CatalogStore, logger: CatalogLogger): CatalogService {
  function report(outcome: CatalogOutcome): CatalogOutcome {
    const tag = pc.cyan('[catalog]');
    if (outcome.level === 'error') logger.error(`${tag} ${pc.red(outcome.message)}`, { timestamp: true });
    else if (outcome.level === 'warning') logger.warn(`${tag} ${pc.yellow(outcome.message)}`, { timestamp: true });
    else logger.info(`${tag} ${outcome.message}`, { timestamp: true });
    return outcome;
  }

  return {
    getCatalog() {
      return store.load();
    },

    addSurface(submission) {
      const catalog = store.load();
      const result = applySurfaceSubmission(catalog, submission);
      if (!result.ok) return report({ level: 'error', message: result.error });
      store.save(catalog);
      return report({ level: 'success', message: result.value });
    },

    importCatalog(text) {
      const incoming = parseUploadedCatalog(text);
      if (!incoming.ok) return report({ level: 'error', message: incoming.error });

      const catalog = store.load();
      const { added, skipped } = mergeUploadedBoilers(catalog, incoming.value);
      const skippedNote = skipped > 0 ? ` (${skipped} without an ID or name skipped)` : '';
      if (added === 0) {
        return report({
          level: 'info',
          message: `File processed, but no new boilers or surfaces were added${skippedNote}`,
          added,
          skipped,
        });
      }
      store.save(catalog);
      return report({
        level: 'success',
        message: `Imported ${added} new boilers/surfaces${skippedNote}`,
        added,
        skipped,
      });
    },

    deleteBoiler(boilerId) {
      const catalog = store.load();
      const index = catalog.boilers.findIndex(boiler => boiler.id === boilerId);
      if (index === -1) return report({ level: 'warning', message: `Boiler "${boilerId}" not found; nothing deleted` });
      catalog.boilers.splice(index, 1);
      store.save(catalog);
      return report({ level: 'success', message: `Deleted boiler "${boilerId}"` });
    },

    deleteSurface(boilerId, surfaceName) {
      const catalog = store.load();
      const boiler = catalog.boilers.find(candidate => candidate.id === boilerId);
      const index = boiler ? boiler.surfaces.findIndex(surface => surface.name === surfaceName) : -1;
      if (boiler === undefined || index === -1) {
        return report({
          level: 'warning',
          message: `Surface "${surfaceName}" of boiler "${boilerId}" not found; nothing deleted`,
        });
      }
      boiler.surfaces.splice(index, 1);
      store.save(catalog);
      return report({ level: 'success', message: `Deleted surface "${surfaceName}" from boiler "${boilerId}"` });
    },

    deleteCatalog() {
      if (!store.remove()) return report({ level: 'warning', message: 'The catalog file does not exist; nothing deleted' });
      return report({ level: 'success', message: 'Catalog deleted' });
    },
  };
}
