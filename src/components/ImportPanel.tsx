import { useRef, useState } from 'react';

interface Props {
  onImport: (text: string) => Promise<unknown>;
}

/**
 * Uploads a JSON file with a `boilers` array.  Parsing and merging happen on
 * the server; duplicate surfaces are skipped there.
 */
export default function ImportPanel({ onImport }: Props) {
  const inputRef = useRef<HTMLInputElement>(null);
  const [isImporting, setIsImporting] = useState(false);

  async function handleFile(file: File) {
    setIsImporting(true);
    try {
      await onImport(await file.text());
    } finally {
      setIsImporting(false);
      if (inputRef.current) inputRef.current.value = '';
    }
  }

  return (
    <div style={{ display: 'flex', alignItems: 'center', gap: '0.75rem', flexWrap: 'wrap' }}>
      <input
        ref={inputRef}
        type="file"
        accept=".json,application/json"
        disabled={isImporting}
        onChange={e => {
          const file = e.target.files?.[0];
          if (file) void handleFile(file);
        }}
      />
      {isImporting && <span style={{ fontSize: '0.8rem', color: '#718096' }}>Importing…</span>}
    </div>
  );
}
