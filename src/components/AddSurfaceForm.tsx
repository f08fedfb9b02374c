import { useState } from 'react';
import type { FormEvent } from 'react';
import type { BoilerFormInput, SurfaceFormInput, SurfaceSubmission } from '../contracts/CatalogApiV1';

const NEW_BOILER = '__new__';

interface Props {
  boilerIds: string[];
  onSubmit: (submission: SurfaceSubmission) => Promise<boolean>;
}

type SurfaceDraft = Required<{ [K in keyof SurfaceFormInput]: string }>;
type BoilerDraft = Required<BoilerFormInput>;

const emptySurface: SurfaceDraft = {
  name: '',
  aliases: '',
  steel: '',
  pressure: '',
  temperature: '',
  outerDiameter: '',
  wallThickness: '',
  loadCondition: '',
  category: '',
  system: '',
  section: '',
  surfaceGroup: '',
  notes: '',
};

const emptyBoiler: BoilerDraft = {
  id: '',
  name: '',
  station: '',
  boilerType: '',
  location: '',
  parameters: '',
  notes: '',
};

const SURFACE_FIELDS: Array<{ key: keyof SurfaceDraft; label: string; placeholder?: string; numeric?: boolean }> = [
  { key: 'name', label: 'Surface name', placeholder: 'e.g. Superheater' },
  { key: 'aliases', label: 'Alternative names (comma-separated)' },
  { key: 'steel', label: 'Steel grade' },
  { key: 'pressure', label: 'Pressure, MPa', numeric: true },
  { key: 'temperature', label: 'Temperature, °C', numeric: true },
  { key: 'outerDiameter', label: 'Outer diameter, mm', numeric: true },
  { key: 'wallThickness', label: 'Wall thickness, mm', numeric: true },
  { key: 'loadCondition', label: 'Load condition', placeholder: 'e.g. 100%' },
  { key: 'category', label: 'Category' },
  { key: 'system', label: 'System' },
  { key: 'section', label: 'Section' },
  { key: 'surfaceGroup', label: 'Surface group' },
];

const BOILER_FIELDS: Array<{ key: keyof BoilerDraft; label: string }> = [
  { key: 'id', label: 'New boiler ID' },
  { key: 'name', label: 'Boiler name' },
  { key: 'station', label: 'Station' },
  { key: 'boilerType', label: 'Boiler type' },
  { key: 'location', label: 'Location' },
  { key: 'parameters', label: 'Parameters' },
  { key: 'notes', label: 'Boiler notes' },
];

const labelStyle = { display: 'flex', flexDirection: 'column' as const, fontSize: '0.78rem', color: '#4a5568', gap: 4 };

export default function AddSurfaceForm({ boilerIds, onSubmit }: Props) {
  const [target, setTarget] = useState<string>(NEW_BOILER);
  const [boiler, setBoiler] = useState<BoilerDraft>(emptyBoiler);
  const [surface, setSurface] = useState<SurfaceDraft>(emptySurface);
  const [isSaving, setIsSaving] = useState(false);

  async function handleSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault();
    const submission: SurfaceSubmission = {
      target: target === NEW_BOILER ? { kind: 'new', boiler } : { kind: 'existing', boilerId: target },
      surface,
    };
    setIsSaving(true);
    const saved = await onSubmit(submission);
    setIsSaving(false);
    if (!saved) return;
    setSurface(emptySurface);
    if (target === NEW_BOILER) {
      setTarget(boiler.id.trim());
      setBoiler(emptyBoiler);
    }
  }

  return (
    <form onSubmit={e => void handleSubmit(e)} style={{ display: 'grid', gap: '1rem' }}>
      <label style={labelStyle}>
        Existing boiler or a new one
        <select value={target} onChange={e => setTarget(e.target.value)}>
          <option value={NEW_BOILER}>New boiler</option>
          {boilerIds.map(id => (
            <option key={id} value={id}>{id}</option>
          ))}
        </select>
      </label>

      {target === NEW_BOILER && (
        <div className="form-grid">
          {BOILER_FIELDS.map(field => (
            <label key={field.key} style={labelStyle}>
              {field.label}
              <input
                value={boiler[field.key]}
                onChange={e => setBoiler(prev => ({ ...prev, [field.key]: e.target.value }))}
              />
            </label>
          ))}
        </div>
      )}

      <div className="form-grid">
        {SURFACE_FIELDS.map(field => (
          <label key={field.key} style={labelStyle}>
            {field.label}
            <input
              value={surface[field.key]}
              inputMode={field.numeric ? 'decimal' : undefined}
              placeholder={field.placeholder}
              onChange={e => setSurface(prev => ({ ...prev, [field.key]: e.target.value }))}
            />
          </label>
        ))}
      </div>

      <label style={labelStyle}>
        Notes
        <textarea
          rows={4}
          value={surface.notes}
          onChange={e => setSurface(prev => ({ ...prev, notes: e.target.value }))}
        />
      </label>

      <div>
        <button type="submit" className="primary-btn" disabled={isSaving}>
          {isSaving ? 'Saving…' : 'Save surface'}
        </button>
      </div>
    </form>
  );
}
