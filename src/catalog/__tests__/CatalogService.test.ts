import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createCatalogService } from '../CatalogService';
import type { CatalogLogger, CatalogService } from '../CatalogService';
import { createCatalogStore } from '../store/CatalogStore';
import type { CatalogStore } from '../store/CatalogStore';
import { sampleCatalog, silentLogger } from './fixtures';

let dir: string;
let store: CatalogStore;
let logger: CatalogLogger;
let service: CatalogService;

function fileText(): string {
  return readFileSync(store.path, 'utf-8');
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'catalog-service-'));
  store = createCatalogStore(join(dir, 'data', 'boilers_reference.json'));
  logger = silentLogger();
  service = createCatalogService(store, logger);
  store.save(sampleCatalog());
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('CatalogService – addSurface', () => {
  it('rejects an empty surface name and leaves the file untouched', () => {
    const before = fileText();
    const outcome = service.addSurface({
      target: { kind: 'existing', boilerId: 'TGM-84-1' },
      surface: { name: '' },
    });
    expect(outcome).toEqual({ level: 'error', message: 'Enter the surface name' });
    expect(fileText()).toBe(before);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('refuses a duplicate surface name and leaves the file untouched', () => {
    const before = fileText();
    const outcome = service.addSurface({
      target: { kind: 'existing', boilerId: 'TGM-84-1' },
      surface: { name: 'Экономайзер', steel: 'Ст20' },
    });
    expect(outcome).toEqual({
      level: 'error',
      message: 'Surface "Экономайзер" already exists on boiler "TGM-84-1"',
    });
    expect(fileText()).toBe(before);
  });

  it('persists a new boiler with its first surface', () => {
    const outcome = service.addSurface({
      target: { kind: 'new', boiler: { id: 'K-7', station: 'StationC' } },
      surface: { name: 'Экономайзер', pressure: '4' },
    });
    expect(outcome).toEqual({ level: 'success', message: 'Added boiler "K-7" with surface "Экономайзер"' });
    const saved = store.load();
    expect(saved.boilers.map(b => b.id)).toEqual(['TGM-84-1', 'BKZ-420-2', 'K-7']);
    expect(saved.boilers[2].surfaces[0].pressure).toBe(4);
  });

  it('creates the file on first write when none exists', () => {
    store.remove();
    service.addSurface({ target: { kind: 'new', boiler: { id: 'K-1' } }, surface: { name: 'ПП' } });
    expect(store.load().boilers).toEqual([
      {
        id: 'K-1',
        surfaces: [{
          name: 'ПП',
          aliases: [],
          steel: null,
          pressure: null,
          temperature: null,
          outerDiameter: null,
          wallThickness: null,
          loadCondition: null,
          category: null,
          system: null,
          section: null,
          surface_group: null,
          notes: null,
        }],
      },
    ]);
  });
});

describe('CatalogService – importCatalog', () => {
  it('reports malformed JSON and writes nothing', () => {
    const before = fileText();
    const outcome = service.importCatalog('not json');
    expect(outcome.level).toBe('error');
    expect(outcome.message).toMatch(/^Could not read the file: /);
    expect(fileText()).toBe(before);
  });

  it('imports one new surface into an existing boiler', () => {
    const outcome = service.importCatalog(JSON.stringify({
      boilers: [{ id: 'BKZ-420-2', surfaces: [{ name: 'Пароперегреватель' }, { name: 'Экономайзер' }] }],
    }));
    expect(outcome).toEqual({
      level: 'success',
      message: 'Imported 1 new boilers/surfaces',
      added: 1,
      skipped: 0,
    });
    expect(store.load().boilers[1].surfaces).toHaveLength(2);
  });

  it('does not rewrite the file when nothing is new', () => {
    const before = fileText();
    const outcome = service.importCatalog(JSON.stringify({
      boilers: [{ id: 'TGM-84-1', surfaces: [{ name: 'Экономайзер' }] }, { surfaces: [] }],
    }));
    expect(outcome).toEqual({
      level: 'info',
      message: 'File processed, but no new boilers or surfaces were added (1 without an ID or name skipped)',
      added: 0,
      skipped: 1,
    });
    expect(fileText()).toBe(before);
  });
});

describe('CatalogService – deletion', () => {
  it('warns when the boiler is absent and writes nothing', () => {
    const before = fileText();
    expect(service.deleteBoiler('nope')).toEqual({
      level: 'warning',
      message: 'Boiler "nope" not found; nothing deleted',
    });
    expect(fileText()).toBe(before);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('deletes a boiler', () => {
    expect(service.deleteBoiler('TGM-84-1').level).toBe('success');
    expect(store.load().boilers.map(b => b.id)).toEqual(['BKZ-420-2']);
  });

  it('deletes a single surface', () => {
    expect(service.deleteSurface('TGM-84-1', 'Экономайзер')).toEqual({
      level: 'success',
      message: 'Deleted surface "Экономайзер" from boiler "TGM-84-1"',
    });
    expect(store.load().boilers[0].surfaces.map(s => s.name)).toEqual(['Пароперегреватель', 'Экраны топки']);
  });

  it('warns when the surface is absent', () => {
    expect(service.deleteSurface('TGM-84-1', 'Котёл').level).toBe('warning');
    expect(service.deleteSurface('nope', 'Экономайзер').level).toBe('warning');
  });

  it('deletes the catalog file, then warns on a second delete', () => {
    expect(service.deleteCatalog()).toEqual({ level: 'success', message: 'Catalog deleted' });
    expect(existsSync(store.path)).toBe(false);
    expect(service.deleteCatalog()).toEqual({
      level: 'warning',
      message: 'The catalog file does not exist; nothing deleted',
    });
    expect(service.getCatalog()).toEqual({ boilers: [] });
  });
});
