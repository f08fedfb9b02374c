import type { IncomingMessage, ServerResponse } from 'node:http';
import pc from 'picocolors';
import { loadEnv, type Connect, type Plugin, type ResolvedConfig } from 'vite';
import { createCatalogService } from '../catalog/CatalogService';
import { createCatalogStore } from '../catalog/store/CatalogStore';
import { resolveCatalogConfig } from './config';
import { handleCatalogRequest, type ApiResponse } from './catalogApi';

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

function send(res: ServerResponse, response: ApiResponse): void {
  res.statusCode = response.status;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(response.body));
}

function mountCatalogApi(middlewares: Connect.Server, config: ResolvedConfig): void {
  const env = loadEnv(config.mode, config.envDir || config.root, 'CATALOG_');
  const { dataPath, apiBase } = resolveCatalogConfig(env, config.root);
  const service = createCatalogService(createCatalogStore(dataPath), config.logger);

  middlewares.use(apiBase, (req: Connect.IncomingMessage, res: ServerResponse, next: Connect.NextFunction) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    readBody(req)
      .then(body => send(res, handleCatalogRequest(service, { method: req.method ?? 'GET', path, body })))
      .catch(next);
  });

  config.logger.info(`${pc.cyan('[catalog]')} ${apiBase} → ${pc.dim(dataPath)}`);
}

/**
 * Serves the catalog API from the Vite dev and preview servers, so the
 * dashboard and the JSON document it edits run as one process.
 */
export function catalogApiPlugin(): Plugin {
  return {
    name: 'catalog-api',
    configureServer(server) {
      mountCatalogApi(server.middlewares, server.config);
    },
    configurePreviewServer(server) {
      mountCatalogApi(server.middlewares, server.config);
    },
  };
}
