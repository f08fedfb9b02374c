import { useCallback, useEffect, useState } from 'react';
import type { CatalogOutcome } from '../contracts/CatalogApiV1';
import type { Catalog } from '../catalog/schema/CatalogV1';
import { fetchCatalog } from '../api/catalogClient';

interface CatalogState {
  catalog: Catalog | null;
  loading: boolean;
  /** Load or server failure; user-level outcomes go to `outcome`. */
  error: string | null;
  outcome: CatalogOutcome | null;
}

/**
 * Holds the catalog for the dashboard.  `run` performs one write request,
 * reloads the catalog afterwards so the view reflects the file, and resolves
 * to the outcome (null when the request itself failed).
 */
export function useCatalog() {
  const [state, setState] = useState<CatalogState>({ catalog: null, loading: true, error: null, outcome: null });

  const reload = useCallback(async () => {
    setState(prev => ({ ...prev, loading: true }));
    try {
      const catalog = await fetchCatalog();
      setState(prev => ({ ...prev, catalog, loading: false, error: null }));
    } catch (err) {
      setState(prev => ({ ...prev, loading: false, error: err instanceof Error ? err.message : String(err) }));
    }
  }, []);

  const run = useCallback(async (action: () => Promise<CatalogOutcome>): Promise<CatalogOutcome | null> => {
    let outcome: CatalogOutcome | null = null;
    try {
      outcome = await action();
      const reported = outcome;
      setState(prev => ({ ...prev, outcome: reported }));
    } catch (err) {
      setState(prev => ({ ...prev, error: err instanceof Error ? err.message : String(err) }));
    }
    await reload();
    return outcome;
  }, [reload]);

  const dismissOutcome = useCallback(() => setState(prev => ({ ...prev, outcome: null })), []);

  useEffect(() => {
    void reload();
  }, [reload]);

  return { ...state, reload, run, dismissOutcome };
}
