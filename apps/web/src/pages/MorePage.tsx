import { useState } from 'react';
import { ENDPOINTS, type ExperienceMode, type ExportTextResponse } from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { reportError } from '../services/telemetry.js';
import { useExperienceMode } from '../stores/experience.js';
import { PageHeader, SegmentedControl } from '../components/ui.js';

const MODE_HINTS: Record<ExperienceMode, string> = {
  gentle: 'Fewer details, softer prompts.',
  structured: 'More detail: averages, tags and labels.',
};

export function MorePage() {
  const { mode, setMode } = useExperienceMode();
  const [exportText, setExportText] = useState<string | null>(null);
  const [exporting, setExporting] = useState(false);
  const [exportError, setExportError] = useState<string | null>(null);

  async function handleExport() {
    setExporting(true);
    setExportError(null);
    try {
      const res = await api.get<ExportTextResponse>(ENDPOINTS.exportText);
      setExportText(typeof res?.text === 'string' ? res.text : '');
    } catch (err) {
      reportError(err, 'more.export');
      setExportError('Could not export right now.');
    } finally {
      setExporting(false);
    }
  }

  return (
    <div className="page narrow">
      <PageHeader title="More" description="Settings, export and support." />

      <div className="card">
        <strong>Experience</strong>
        <SegmentedControl<ExperienceMode>
          label="Experience mode"
          value={mode}
          onChange={setMode}
          options={[
            { value: 'gentle', label: 'Gentle' },
            { value: 'structured', label: 'Structured' },
          ]}
        />
        <span className="muted" data-testid="mode-hint">{MODE_HINTS[mode]}</span>
      </div>

      <div className="card">
        <strong>Export my data</strong>
        <span className="muted">A plain-text copy of your recent entries, ready to paste anywhere.</span>
        <div className="row">
          <button
            className="btn"
            onClick={() => void handleExport()}
            disabled={exporting}
            data-testid="export-button"
          >
            {exporting ? 'Preparing…' : 'Export as text'}
          </button>
        </div>
        {exportError && <p role="status" className="muted error" data-testid="export-error">{exportError}</p>}
        {exportText !== null && (
          <textarea className="field area" readOnly value={exportText} aria-label="Export" data-testid="export-text" />
        )}
      </div>

      <div className="card">
        <strong>Crisis resources</strong>
        <span className="muted">
          The “Need help now?” button is on every page. For the full list, visit{' '}
          <a href={ENDPOINTS.crisisPage}>{ENDPOINTS.crisisPage}</a>.
        </span>
      </div>
    </div>
  );
}
