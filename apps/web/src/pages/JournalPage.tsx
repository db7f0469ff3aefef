// =============================================================================
// Lumen Harbor Web — Journal page
// Free write (draft mirrored to local storage until it is saved) and guided
// tools (thought record).
// =============================================================================

import { useState } from 'react';
import { ENDPOINTS, JournalAppendSchema, STORAGE_KEYS, type OkResponse } from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { reportError } from '../services/telemetry.js';
import { useLocalStorageState } from '../hooks/useLocalStorageState.js';
import { useExperienceMode } from '../stores/experience.js';
import { ThoughtRecordWizard } from '../components/ThoughtRecordWizard.js';
import { PageHeader, SegmentedControl } from '../components/ui.js';

type Tab = 'free' | 'guided';

export function JournalPage() {
  const { mode } = useExperienceMode();
  const [tab, setTab] = useState<Tab>('free');

  return (
    <div className="page narrow">
      <PageHeader
        title="Journal"
        description="A private space to write it out, or use a gentle tool."
      />
      <SegmentedControl<Tab>
        label="Journal mode"
        value={tab}
        onChange={setTab}
        options={[
          { value: 'free', label: 'Free write' },
          { value: 'guided', label: 'Guided tools' },
        ]}
      />
      {tab === 'free' ? <FreeWrite showPrompt={mode === 'gentle'} /> : <ThoughtRecordWizard />}
    </div>
  );
}

function FreeWrite({ showPrompt }: { showPrompt: boolean }) {
  const [draft, setDraft] = useLocalStorageState<string>(STORAGE_KEYS.journalDraft, '');
  const [status, setStatus] = useState('Draft');
  const [saving, setSaving] = useState(false);

  async function handleSave() {
    const parsed = JournalAppendSchema.safeParse({ text: draft, tags: [] });
    if (!parsed.success) return;
    setSaving(true);
    setStatus('Saving…');
    try {
      await api.post<OkResponse>(ENDPOINTS.journalAppend, parsed.data);
      setStatus('Saved just now');
      setDraft('');
    } catch (err) {
      reportError(err, 'journal.freeWrite.save');
      setStatus('Could not save right now');
    } finally {
      setSaving(false);
    }
  }

  const canSave = draft.trim().length > 0 && !saving;

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 12 }}>
      {showPrompt && (
        <div className="card soft">
          <strong>What’s on your mind?</strong>
          <div className="muted">Write a little or a lot. You can stop anytime.</div>
        </div>
      )}

      <div className="card">
        <textarea
          className="field area"
          placeholder="Start with one sentence. That’s enough."
          value={draft}
          onChange={(e) => {
            setDraft(e.target.value);
            setStatus('Draft');
          }}
          aria-label="Journal entry"
          data-testid="journal-draft"
        />
        <div className="row between">
          <span role="status" className="muted" data-testid="journal-status">{status}</span>
          <button
            className="btn primary"
            onClick={() => void handleSave()}
            disabled={!canSave}
            aria-busy={saving}
            data-testid="journal-save"
          >
            {saving ? 'Saving…' : 'Save entry'}
          </button>
        </div>
      </div>
    </div>
  );
}
