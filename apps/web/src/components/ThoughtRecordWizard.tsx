import type { CSSProperties, ReactNode } from 'react';
import { LIMITS } from '@lumen-harbor/shared';
import {
  THOUGHT_RECORD_STEPS,
  useThoughtRecordWizard,
} from '../hooks/useThoughtRecordWizard.js';

const fieldStyle: CSSProperties = {
  width: '100%', boxSizing: 'border-box',
  background: 'var(--glass-01)', border: '1px solid var(--border)',
  color: 'var(--ink)', borderRadius: 8, padding: '10px 12px',
  fontSize: 13, lineHeight: 1.6, fontFamily: 'inherit',
};

const areaStyle: CSSProperties = { ...fieldStyle, minHeight: 110, resize: 'vertical' };

function navButtonStyle(enabled: boolean): CSSProperties {
  return {
    background: enabled ? 'var(--safe)' : 'var(--glass-02)',
    border: 'none', color: enabled ? '#0a0e1a' : 'var(--ink-soft)',
    borderRadius: 6, padding: '8px 16px', fontSize: 13, fontWeight: 600,
    cursor: enabled ? 'pointer' : 'not-allowed',
  };
}

/** Guided CBT thought record: Situation → Thought → Emotion → Evidence → Alternative. */
export function ThoughtRecordWizard() {
  const w = useThoughtRecordWizard();
  const { draft, update } = w;

  const bodies: ReactNode[] = [
    <textarea
      key="situation"
      style={areaStyle}
      placeholder="What happened? Where were you? Who was there?"
      value={draft.situation}
      onChange={(e) => update('situation', e.target.value)}
      aria-label="Situation"
      data-testid="tr-situation"
    />,
    <textarea
      key="thoughts"
      style={areaStyle}
      placeholder="What did your mind say in that moment?"
      value={draft.thoughts}
      onChange={(e) => update('thoughts', e.target.value)}
      aria-label="Thought"
      data-testid="tr-thoughts"
    />,
    <div key="emotions" style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
      <input
        type="text"
        style={fieldStyle}
        placeholder="Emotion(s), e.g., anxious, sad, angry"
        value={draft.emotions}
        onChange={(e) => update('emotions', e.target.value)}
        aria-label="Emotions"
        data-testid="tr-emotions"
      />
      <div style={{ display: 'flex', justifyContent: 'space-between', fontSize: 12, color: 'var(--ink-soft)' }}>
        <span>Intensity ({LIMITS.INTENSITY_MIN}–{LIMITS.INTENSITY_MAX})</span>
        <span data-testid="tr-intensity-value">{draft.intensity}/{LIMITS.INTENSITY_MAX}</span>
      </div>
      <input
        type="range"
        min={LIMITS.INTENSITY_MIN}
        max={LIMITS.INTENSITY_MAX}
        step={1}
        value={draft.intensity}
        onChange={(e) => update('intensity', Number(e.target.value))}
        aria-label="Emotion intensity"
        data-testid="tr-intensity"
      />
    </div>,
    <div key="evidence" style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
      <textarea
        style={areaStyle}
        placeholder="Evidence for the thought"
        value={draft.evidence_for}
        onChange={(e) => update('evidence_for', e.target.value)}
        aria-label="Evidence for"
        data-testid="tr-evidence-for"
      />
      <textarea
        style={areaStyle}
        placeholder="Evidence against the thought"
        value={draft.evidence_against}
        onChange={(e) => update('evidence_against', e.target.value)}
        aria-label="Evidence against"
        data-testid="tr-evidence-against"
      />
    </div>,
    <textarea
      key="alternative"
      style={areaStyle}
      placeholder="A kinder, more balanced thought (even if you only partly believe it)."
      value={draft.alternative_thought}
      onChange={(e) => update('alternative_thought', e.target.value)}
      aria-label="Alternative thought"
      data-testid="tr-alternative"
    />,
  ];

  return (
    <div
      style={{ background: 'var(--glass-01)', border: '1px solid var(--border)', borderRadius: 12, padding: '18px 20px', display: 'flex', flexDirection: 'column', gap: 14 }}
      data-testid="thought-record"
    >
      <strong style={{ color: 'var(--ink)', fontSize: 14 }} data-testid="tr-heading">
        Thought record · Step {w.step + 1}/{THOUGHT_RECORD_STEPS.length}: {w.title}
      </strong>

      {bodies[w.step]}

      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
        <button onClick={w.back} disabled={!w.canGoBack} style={navButtonStyle(w.canGoBack)} data-testid="tr-back">
          Back
        </button>

        {w.isLastStep ? (
          <button
            onClick={() => void w.save()}
            disabled={w.saving}
            aria-busy={w.saving}
            style={navButtonStyle(!w.saving)}
            data-testid="tr-save"
          >
            {w.saving ? 'Saving…' : 'Save thought record'}
          </button>
        ) : (
          <button onClick={w.next} disabled={!w.canGoNext} style={navButtonStyle(w.canGoNext)} data-testid="tr-next">
            Next
          </button>
        )}
      </div>

      {w.status && (
        <div role="status" style={{ fontSize: 12, color: 'var(--ink-soft)' }} data-testid="tr-status">
          {w.status}
        </div>
      )}
    </div>
  );
}
