import type { ApiErrorBody, CatalogOutcome } from '../contracts/CatalogApiV1';
import type { CatalogService } from '../catalog/CatalogService';
import type { Catalog } from '../catalog/schema/CatalogV1';
import { SurfaceSubmissionSchema, describeIssue } from '../catalog/schema/catalogSchema';

export interface ApiRequest {
  method: string;
  /** Path below the API mount point, e.g. "/boilers/K-1". */
  path: string;
  body: string;
}

export interface ApiResponse {
  status: number;
  body: Catalog | CatalogOutcome | ApiErrorBody;
}

function outcomeResponse(outcome: CatalogOutcome): ApiResponse {
  return { status: outcome.level === 'error' ? 400 : 200, body: outcome };
}

function errorResponse(status: number, error: string): ApiResponse {
  return { status, body: { error } };
}

function splitPath(path: string): string[] | null {
  try {
    return path.split('/').filter(segment => segment !== '').map(decodeURIComponent);
  } catch {
    return null;
  }
}

function submitSurface(service: CatalogService, body: string): ApiResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return errorResponse(400, 'Request body is not valid JSON');
  }
  const submission = SurfaceSubmissionSchema.safeParse(raw);
  if (!submission.success) return errorResponse(400, describeIssue(submission.error));
  return outcomeResponse(service.addSurface(submission.data));
}

function route(service: CatalogService, method: string, segments: string[], body: string): ApiResponse {
  const [head, boilerId, sub, surfaceName, ...rest]: Array<string | undefined> = segments;

  if (head === undefined) {
    if (method === 'GET') return { status: 200, body: service.getCatalog() };
    if (method === 'DELETE') return outcomeResponse(service.deleteCatalog());
    return errorResponse(405, `${method} is not supported here`);
  }

  if ((head === 'surfaces' || head === 'import') && boilerId === undefined) {
    if (method !== 'POST') return errorResponse(405, `${method} is not supported here`);
    return head === 'surfaces' ? submitSurface(service, body) : outcomeResponse(service.importCatalog(body));
  }

  if (head === 'boilers' && boilerId !== undefined && rest.length === 0) {
    if (sub === undefined) {
      if (method !== 'DELETE') return errorResponse(405, `${method} is not supported here`);
      return outcomeResponse(service.deleteBoiler(boilerId));
    }
    if (sub === 'surfaces' && surfaceName !== undefined) {
      if (method !== 'DELETE') return errorResponse(405, `${method} is not supported here`);
      return outcomeResponse(service.deleteSurface(boilerId, surfaceName));
    }
  }

  return errorResponse(404, 'Not found');
}

/**
 * Maps one API request onto the catalog service.  Store failures become a
 * 500 carrying the error message.
 */
export function handleCatalogRequest(service: CatalogService, request: ApiRequest): ApiResponse {
  const segments = splitPath(request.path);
  if (segments === null) return errorResponse(400, 'Malformed path');
  try {
    return route(service, request.method.toUpperCase(), segments, request.body);
  } catch (err) {
    return errorResponse(500, err instanceof Error ? err.message : String(err));
  }
}
