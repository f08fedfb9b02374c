import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { handleCatalogRequest } from '../catalogApi';
import type { ApiRequest } from '../catalogApi';
import { createCatalogService } from '../../catalog/CatalogService';
import type { CatalogService } from '../../catalog/CatalogService';
import { createCatalogStore } from '../../catalog/store/CatalogStore';
import type { CatalogStore } from '../../catalog/store/CatalogStore';
import { sampleCatalog, silentLogger } from '../../catalog/__tests__/fixtures';

let dir: string;
let store: CatalogStore;
let service: CatalogService;

function call(method: string, path: string, body = '') {
  const request: ApiRequest = { method, path, body };
  return handleCatalogRequest(service, request);
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'catalog-api-'));
  store = createCatalogStore(join(dir, 'boilers_reference.json'));
  service = createCatalogService(store, silentLogger());
  store.save(sampleCatalog());
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('GET /', () => {
  it('returns the stored catalog', () => {
    expect(call('GET', '/')).toEqual({ status: 200, body: sampleCatalog() });
  });

  it('treats the bare mount point like the root', () => {
    expect(call('get', '').status).toBe(200);
  });

  it('answers 500 with the store error when the file is corrupt', () => {
    writeFileSync(store.path, '{', 'utf-8');
    const response = call('GET', '/');
    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: expect.stringMatching(/is not valid JSON/) });
  });
});

describe('POST /surfaces', () => {
  it('adds a surface to an existing boiler', () => {
    const body = JSON.stringify({
      target: { kind: 'existing', boilerId: 'BKZ-420-2' },
      surface: { name: 'Экономайзер', pressure: '15,5' },
    });
    expect(call('POST', '/surfaces', body)).toEqual({
      status: 200,
      body: { level: 'success', message: 'Added surface "Экономайзер" to boiler "BKZ-420-2"' },
    });
    expect(store.load().boilers[1].surfaces[1].pressure).toBe(15.5);
  });

  it('answers 400 for a body that is not JSON', () => {
    expect(call('POST', '/surfaces', '{')).toEqual({
      status: 400,
      body: { error: 'Request body is not valid JSON' },
    });
  });

  it('answers 400 naming the first missing field', () => {
    expect(call('POST', '/surfaces', JSON.stringify({ surface: { name: 'ПП' } }))).toEqual({
      status: 400,
      body: { error: 'target: Required' },
    });
  });

  it('answers 400 with the validation message for a rejected form', () => {
    const body = JSON.stringify({ target: { kind: 'existing', boilerId: 'BKZ-420-2' }, surface: { name: ' ' } });
    expect(call('POST', '/surfaces', body)).toEqual({
      status: 400,
      body: { level: 'error', message: 'Enter the surface name' },
    });
  });
});

describe('POST /import', () => {
  it('merges the uploaded document', () => {
    const body = JSON.stringify({ boilers: [{ id: 'TP-87-3', surfaces: [{ name: 'ПП' }] }] });
    expect(call('POST', '/import', body)).toEqual({
      status: 200,
      body: { level: 'success', message: 'Imported 1 new boilers/surfaces', added: 1, skipped: 0 },
    });
  });

  it('answers 400 for a document without boilers', () => {
    expect(call('POST', '/import', '{"items": []}')).toEqual({
      status: 400,
      body: { level: 'error', message: 'The file is not a boiler catalog (boilers: Required)' },
    });
  });
});

describe('DELETE routes', () => {
  it('deletes a boiler', () => {
    expect(call('DELETE', '/boilers/TGM-84-1')).toEqual({
      status: 200,
      body: { level: 'success', message: 'Deleted boiler "TGM-84-1"' },
    });
  });

  it('reports a missing boiler as a warning with status 200', () => {
    expect(call('DELETE', '/boilers/nope')).toEqual({
      status: 200,
      body: { level: 'warning', message: 'Boiler "nope" not found; nothing deleted' },
    });
  });

  it('decodes the surface name from the path', () => {
    const response = call('DELETE', `/boilers/TGM-84-1/surfaces/${encodeURIComponent('Экраны топки')}`);
    expect(response).toEqual({
      status: 200,
      body: { level: 'success', message: 'Deleted surface "Экраны топки" from boiler "TGM-84-1"' },
    });
  });

  it('deletes the whole catalog', () => {
    expect(call('DELETE', '/').body).toEqual({ level: 'success', message: 'Catalog deleted' });
    expect(call('GET', '/').body).toEqual({ boilers: [] });
  });
});

describe('routing errors', () => {
  it('answers 405 for an unsupported method', () => {
    expect(call('PUT', '/')).toEqual({ status: 405, body: { error: 'PUT is not supported here' } });
    expect(call('GET', '/surfaces')).toEqual({ status: 405, body: { error: 'GET is not supported here' } });
  });

  it('answers 404 for an unknown path', () => {
    expect(call('GET', '/unknown')).toEqual({ status: 404, body: { error: 'Not found' } });
    expect(call('DELETE', '/boilers/K-1/surfaces/ПП/extra')).toEqual({ status: 404, body: { error: 'Not found' } });
  });

  it('answers 400 for a malformed percent-encoded path', () => {
    expect(call('DELETE', '/boilers/%E0%A4%A')).toEqual({ status: 400, body: { error: 'Malformed path' } });
  });
});
