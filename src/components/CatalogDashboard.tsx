/**
 * CatalogDashboard
 *
 * Search and data-entry page for the boiler heating-surface catalog:
 * headline metrics, free-text search with multi-select filters, the surface
 * table with CSV export, the add-surface form, JSON import and the raw
 * document view.
 */
import { useMemo, useState } from 'react';
import type { ReactNode } from 'react';
import type { OutcomeLevel, SurfaceSubmission } from '../contracts/CatalogApiV1';
import type { FilterSelections } from '../catalog/schema/CatalogV1';
import { flattenSurfaces } from '../catalog/modules/SurfaceFlattener';
import { filterOptions, searchRows } from '../catalog/modules/QueryEngine';
import { summarizeCatalog } from '../catalog/modules/CatalogMetrics';
import { toCsvFile } from '../catalog/modules/CsvExport';
import {
  deleteBoiler,
  deleteCatalog,
  deleteSurface,
  importCatalogFile,
  submitSurface,
} from '../api/catalogClient';
import { useCatalog } from '../hooks/useCatalog';
import FilterPanel from './FilterPanel';
import SurfaceTable from './SurfaceTable';
import AddSurfaceForm from './AddSurfaceForm';
import ImportPanel from './ImportPanel';
import StationSurfaceChart from './visualizers/StationSurfaceChart';

const OUTCOME_STYLE: Record<OutcomeLevel, { color: string; bg: string; border: string }> = {
  success: { color: '#276749', bg: '#f0fff4', border: '#c6f6d5' },
  info: { color: '#2c5282', bg: '#ebf8ff', border: '#bee3f8' },
  warning: { color: '#c05621', bg: '#fffaf0', border: '#feebc8' },
  error: { color: '#c53030', bg: '#fff5f5', border: '#fed7d7' },
};

function Banner({ level, children, onClose }: { level: OutcomeLevel; children: ReactNode; onClose?: () => void }) {
  const style = OUTCOME_STYLE[level];
  return (
    <div style={{
      display: 'flex', justifyContent: 'space-between', alignItems: 'center', gap: 12,
      padding: '10px 14px', marginBottom: '1rem', borderRadius: 8,
      background: style.bg, border: `1px solid ${style.border}`, color: style.color, fontSize: '0.85rem',
    }}>
      <span>{children}</span>
      {onClose && <button className="link-btn" onClick={onClose}>✕</button>}
    </div>
  );
}

function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section style={{ marginBottom: '2rem' }}>
      <h3 style={{ fontSize: '1rem', fontWeight: 700, color: '#2d3748', margin: '0 0 0.75rem' }}>{title}</h3>
      {children}
    </section>
  );
}

function downloadCsv(csv: string) {
  const blob = new Blob([csv], { type: 'text/csv;charset=utf-8' });
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = 'heating_surfaces.csv';
  link.click();
  // Revoking in the same tick can cancel the download.
  window.setTimeout(() => URL.revokeObjectURL(url), 1000);
}

export default function CatalogDashboard() {
  const { catalog, loading, error, outcome, run, dismissOutcome } = useCatalog();
  const [query, setQuery] = useState('');
  const [selections, setSelections] = useState<FilterSelections>({});
  const [boilerToDelete, setBoilerToDelete] = useState('');

  const rows = useMemo(() => (catalog ? flattenSurfaces(catalog) : []), [catalog]);
  const options = useMemo(() => filterOptions(rows), [rows]);
  const matches = useMemo(() => searchRows(rows, query, selections), [rows, query, selections]);
  const summary = useMemo(() => (catalog ? summarizeCatalog(catalog) : null), [catalog]);
  const boilerIds = useMemo(() => catalog?.boilers.map(b => b.id) ?? [], [catalog]);

  async function handleSubmit(submission: SurfaceSubmission): Promise<boolean> {
    const result = await run(() => submitSurface(submission));
    return result?.level === 'success';
  }

  function handleDeleteCatalog() {
    if (!window.confirm('Delete the whole catalog file? This cannot be undone.')) return;
    void run(deleteCatalog);
  }

  if (loading && !catalog) {
    return <div className="page-container"><p style={{ color: '#718096' }}>Loading catalog…</p></div>;
  }

  return (
    <div className="page-container">
      <div className="page-header">
        <h2 style={{ fontSize: '1.3rem', fontWeight: 800, color: '#2d3748', margin: 0 }}>
          Boiler Heating Surfaces
        </h2>
        <p style={{ color: '#718096', fontSize: '0.85rem', margin: '4px 0 0' }}>
          Search returns every match by boiler, surface and steel grade.
        </p>
      </div>

      {error && <Banner level="error">{error}</Banner>}
      {outcome && <Banner level={outcome.level} onClose={dismissOutcome}>{outcome.message}</Banner>}

      {summary && (
        <div style={{ display: 'flex', gap: '1rem', flexWrap: 'wrap', marginBottom: '1.5rem' }}>
          {[
            { label: 'Boilers', value: summary.boilerCount },
            { label: 'Surfaces', value: summary.surfaceCount },
            { label: 'Components', value: summary.componentCount },
            { label: 'Stations', value: summary.stations.length },
          ].map(card => (
            <div key={card.label} style={{
              flex: 1, minWidth: 130,
              background: '#fff', border: '1.5px solid #e2e8f0', borderRadius: 10,
              padding: '12px 16px', textAlign: 'center',
            }}>
              <div style={{ fontSize: '0.72rem', color: '#718096', marginBottom: 4 }}>{card.label}</div>
              <div style={{ fontSize: '1.5rem', fontWeight: 800, color: '#2c5282' }}>{card.value}</div>
            </div>
          ))}
        </div>
      )}

      {summary && summary.stations.length > 0 && (
        <Section title="Surfaces by station">
          <div style={{ height: 240 }}>
            <StationSurfaceChart stations={summary.stations} />
          </div>
        </Section>
      )}

      <Section title="Search">
        <input
          type="search"
          value={query}
          onChange={e => setQuery(e.target.value)}
          placeholder="Find by boiler, surface or steel grade"
          style={{ width: '100%', marginBottom: '0.75rem' }}
        />
        <FilterPanel options={options} selections={selections} onChange={setSelections} />
        <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', margin: '0.75rem 0' }}>
          <span style={{ fontSize: '0.85rem', color: '#4a5568' }}>
            {matches.length} of {rows.length} rows
          </span>
          <button className="secondary-btn" disabled={matches.length === 0} onClick={() => downloadCsv(toCsvFile(matches))}>
            Export CSV
          </button>
        </div>
        <SurfaceTable
          rows={matches}
          onDeleteSurface={(boilerId, name) => {
            if (window.confirm(`Delete surface "${name}" of boiler "${boilerId}"?`)) {
              void run(() => deleteSurface(boilerId, name));
            }
          }}
        />
      </Section>

      <Section title="Add data">
        <AddSurfaceForm boilerIds={boilerIds} onSubmit={handleSubmit} />
      </Section>

      <Section title="Import from file">
        <ImportPanel onImport={text => run(() => importCatalogFile(text))} />
      </Section>

      <Section title="Delete">
        <div style={{ display: 'flex', gap: '0.75rem', flexWrap: 'wrap', alignItems: 'center' }}>
          <select value={boilerToDelete} onChange={e => setBoilerToDelete(e.target.value)}>
            <option value="">Select a boiler…</option>
            {boilerIds.map(id => (
              <option key={id} value={id}>{id}</option>
            ))}
          </select>
          <button
            className="secondary-btn"
            disabled={boilerToDelete === ''}
            onClick={() => {
              void run(() => deleteBoiler(boilerToDelete));
              setBoilerToDelete('');
            }}
          >
            Delete boiler
          </button>
          <button className="danger-btn" onClick={handleDeleteCatalog}>Delete catalog</button>
        </div>
      </Section>

      <Section title="Source data">
        <details>
          <summary style={{ cursor: 'pointer', color: '#4a5568', fontSize: '0.85rem' }}>
            Show the catalog JSON
          </summary>
          <pre className="json-view">{JSON.stringify(catalog, null, 2)}</pre>
        </details>
      </Section>
    </div>
  );
}
