import { isAbsolute, resolve } from 'node:path';
import { CATALOG_API_BASE } from '../contracts/CatalogApiV1';

export const DEFAULT_CATALOG_PATH = 'data/boilers_reference.json';

export interface CatalogConfig {
  /** Absolute path of the catalog JSON document. */
  dataPath: string;
  apiBase: string;
}

/**
 * Reads `CATALOG_PATH` from the environment Vite loaded for the current mode.
 * Relative paths resolve against the project root.
 */
export function resolveCatalogConfig(env: Record<string, string | undefined>, root: string): CatalogConfig {
  const configured = env.CATALOG_PATH?.trim() || DEFAULT_CATALOG_PATH;
  return {
    dataPath: isAbsolute(configured) ? configured : resolve(root, configured),
    apiBase: CATALOG_API_BASE,
  };
}
