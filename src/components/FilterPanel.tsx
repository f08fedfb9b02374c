import type { FilterDimension, FilterOptions, FilterSelections } from '../catalog/schema/CatalogV1';
import { FILTER_DIMENSIONS } from '../catalog/modules/QueryEngine';

const DIMENSION_LABEL: Record<FilterDimension, string> = {
  station: 'Station',
  boiler_type: 'Boiler type',
  steel: 'Steel grade',
  category: 'Category',
  system: 'System',
};

interface Props {
  options: FilterOptions;
  selections: FilterSelections;
  onChange: (selections: FilterSelections) => void;
}

/** One multi-select per dimension; nothing selected means no filtering. */
export default function FilterPanel({ options, selections, onChange }: Props) {
  function handleSelect(dimension: FilterDimension, element: HTMLSelectElement) {
    const selected = Array.from(element.selectedOptions, option => option.value);
    onChange({ ...selections, [dimension]: selected });
  }

  const hasSelection = FILTER_DIMENSIONS.some(d => (selections[d]?.length ?? 0) > 0);

  return (
    <div style={{ display: 'flex', gap: '0.75rem', flexWrap: 'wrap', alignItems: 'flex-start' }}>
      {FILTER_DIMENSIONS.map(dimension => (
        <label key={dimension} style={{ display: 'flex', flexDirection: 'column', fontSize: '0.78rem', color: '#4a5568', minWidth: 140 }}>
          {DIMENSION_LABEL[dimension]}
          <select
            multiple
            value={[...(selections[dimension] ?? [])]}
            onChange={e => handleSelect(dimension, e.currentTarget)}
            disabled={options[dimension].length === 0}
            style={{ minHeight: 84, marginTop: 4, fontSize: '0.8rem' }}
          >
            {options[dimension].map(value => (
              <option key={value} value={value}>{value}</option>
            ))}
          </select>
        </label>
      ))}
      {hasSelection && (
        <button className="link-btn" onClick={() => onChange({})} style={{ alignSelf: 'center' }}>
          Clear filters
        </button>
      )}
    </div>
  );
}
