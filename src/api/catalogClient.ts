import { CATALOG_API_BASE } from '../contracts/CatalogApiV1';
import type { CatalogOutcome, SurfaceSubmission } from '../contracts/CatalogApiV1';
import type { Catalog } from '../catalog/schema/CatalogV1';
import { CatalogSchema } from '../catalog/schema/catalogSchema';

async function readJson(response: Response): Promise<unknown> {
  const body: unknown = await response.json();
  if (response.status >= 500 || response.status === 404 || response.status === 405) {
    const message =
      typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
        ? body.error
        : `Request failed with status ${response.status}`;
    throw new Error(message);
  }
  return body;
}

function toOutcome(body: unknown): CatalogOutcome {
  if (typeof body === 'object' && body !== null) {
    if ('level' in body && 'message' in body && typeof body.message === 'string') {
      const level = body.level;
      if (level === 'success' || level === 'info' || level === 'warning' || level === 'error') {
        const added = 'added' in body && typeof body.added === 'number' ? body.added : undefined;
        const skipped = 'skipped' in body && typeof body.skipped === 'number' ? body.skipped : undefined;
        return { level, message: body.message, added, skipped };
      }
    }
    if ('error' in body && typeof body.error === 'string') {
      return { level: 'error', message: body.error };
    }
  }
  return { level: 'error', message: 'Unexpected response from the server' };
}

export async function fetchCatalog(): Promise<Catalog> {
  const body = await readJson(await fetch(CATALOG_API_BASE));
  const parsed = CatalogSchema.safeParse(body);
  if (!parsed.success) throw new Error('The server returned a malformed catalog');
  return parsed.data;
}

export async function submitSurface(submission: SurfaceSubmission): Promise<CatalogOutcome> {
  const response = await fetch(`${CATALOG_API_BASE}/surfaces`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(submission),
  });
  return toOutcome(await readJson(response));
}

/** Sends the uploaded file text as-is; the server does the parsing. */
export async function importCatalogFile(text: string): Promise<CatalogOutcome> {
  const response = await fetch(`${CATALOG_API_BASE}/import`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: text,
  });
  return toOutcome(await readJson(response));
}

export async function deleteBoiler(boilerId: string): Promise<CatalogOutcome> {
  const response = await fetch(`${CATALOG_API_BASE}/boilers/${encodeURIComponent(boilerId)}`, { method: 'DELETE' });
  return toOutcome(await readJson(response));
}

export async function deleteSurface(boilerId: string, surfaceName: string): Promise<CatalogOutcome> {
  const response = await fetch(
    `${CATALOG_API_BASE}/boilers/${encodeURIComponent(boilerId)}/surfaces/${encodeURIComponent(surfaceName)}`,
    { method: 'DELETE' },
  );
  return toOutcome(await readJson(response));
}

export async function deleteCatalog(): Promise<CatalogOutcome> {
  return toOutcome(await readJson(await fetch(CATALOG_API_BASE, { method: 'DELETE' })));
}
