import type { SurfaceRow } from '../catalog/schema/CatalogV1';
import { COLUMN_LABELS, SURFACE_COLUMNS } from '../catalog/modules/SurfaceFlattener';

interface Props {
  rows: SurfaceRow[];
  onDeleteSurface?: (boilerId: string, surfaceName: string) => void;
}

export default function SurfaceTable({ rows, onDeleteSurface }: Props) {
  if (rows.length === 0) {
    return (
      <p style={{ color: '#718096', fontSize: '0.85rem' }}>
        No matches yet. Add the first surface below.
      </p>
    );
  }

  return (
    <div style={{ overflowX: 'auto', border: '1px solid #e2e8f0', borderRadius: 8 }}>
      <table style={{ borderCollapse: 'collapse', width: '100%', fontSize: '0.8rem' }}>
        <thead style={{ background: '#f7fafc' }}>
          <tr>
            {SURFACE_COLUMNS.map(column => (
              <th key={column} style={{ padding: '8px', textAlign: 'left', whiteSpace: 'nowrap', color: '#4a5568' }}>
                {COLUMN_LABELS[column]}
              </th>
            ))}
            {onDeleteSurface && <th />}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={`${row.boiler_id}/${row.surface}/${row.component ?? ''}/${i}`} style={{ borderTop: '1px solid #edf2f7' }}>
              {SURFACE_COLUMNS.map(column => (
                <td key={column} style={{ padding: '6px 8px', verticalAlign: 'top' }}>
                  {row[column] ?? ''}
                </td>
              ))}
              {onDeleteSurface && (
                <td style={{ padding: '6px 8px' }}>
                  {/* Component rows share their surface; deleting removes the whole surface. */}
                  <button
                    className="link-btn"
                    title="Delete surface"
                    onClick={() => onDeleteSurface(row.boiler_id, row.surface)}
                  >
                    ✕
                  </button>
                </td>
              )}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
