// =============================================================================
// Lumen Harbor Web — SafetySheet
// Crisis-support overlay. Opens only from the persistent "Need help now?"
// button in AppShell; nothing else may open it. The panel is unmounted while
// closed, so every open starts with fresh fetches and a fresh plan copy.
// =============================================================================

import { useEffect } from 'react';
import type { CSSProperties } from 'react';
import { ENDPOINTS, LIMITS, type CrisisResource } from '@lumen-harbor/shared';
import {
  useCrisisResources,
  useSafetyPlan,
  type SafetyPlanField,
} from '../hooks/useSafetySheetData.js';

interface SafetySheetProps {
  open: boolean;
  onClose: () => void;
}

const PLAN_FIELDS: { field: SafetyPlanField; label: string; placeholder: string }[] = [
  { field: 'warningSigns',         label: 'Early warning signs',   placeholder: 'What are your early signs you’re not okay?' },
  { field: 'copingStrategies',     label: 'Coping strategies',     placeholder: 'What helps even a little?' },
  { field: 'people',               label: 'People I can contact',  placeholder: 'Names + numbers (if you want).' },
  { field: 'places',               label: 'Places I can go',       placeholder: 'A room, a walk, a friend’s place. Anywhere that feels safer.' },
  { field: 'professionalContacts', label: 'Professional contacts', placeholder: 'Therapist, prescriber, clinic, etc.' },
];

const sectionStyle: CSSProperties = {
  background: 'var(--glass-01)',
  border: '1px solid var(--border)',
  borderRadius: 10,
  padding: '16px 18px',
  display: 'flex',
  flexDirection: 'column',
  gap: 10,
};

const headingStyle: CSSProperties = { margin: 0, fontSize: 15, color: 'var(--ink)' };
const mutedStyle: CSSProperties = { margin: 0, fontSize: 13, color: 'var(--ink-soft)' };

export function SafetySheet({ open, onClose }: SafetySheetProps) {
  if (!open) return null;
  return <SafetySheetPanel onClose={onClose} />;
}

function SafetySheetPanel({ onClose }: { onClose: () => void }) {
  const resources = useCrisisResources();
  const plan = useSafetyPlan();

  useEffect(() => {
    function handler(e: KeyboardEvent) {
      if (e.key === 'Escape') onClose();
    }
    window.addEventListener('keydown', handler);
    return () => window.removeEventListener('keydown', handler);
  }, [onClose]);

  return (
    <div
      role="presentation"
      onClick={onClose}
      data-testid="safety-sheet-backdrop"
      style={{
        position: 'fixed', inset: 0,
        background: 'rgba(15,23,42,0.35)',
        display: 'grid', placeItems: 'end center',
        padding: 16,
        zIndex: 950,
      }}
    >
      <div
        role="dialog"
        aria-modal="true"
        aria-label="Safety and crisis support"
        onClick={(e) => e.stopPropagation()}
        data-testid="safety-sheet"
        style={{
          width: 'min(720px, 100%)', maxHeight: '85vh', overflow: 'auto',
          background: 'var(--bg)',
          border: '1px solid var(--border)',
          borderRadius: 14,
          boxShadow: '0 8px 32px rgba(0,0,0,0.35)',
          padding: 24,
          display: 'flex', flexDirection: 'column', gap: 16,
        }}
      >
        {/* Header */}
        <div style={{ display: 'flex', alignItems: 'flex-start', justifyContent: 'space-between', gap: 12 }}>
          <div>
            <h2 style={{ margin: 0, fontSize: 20, color: 'var(--ink)' }}>Need help now?</h2>
            <p style={{ ...mutedStyle, marginTop: 4 }}>
              You deserve support. This panel is always available and easy to exit.
            </p>
          </div>
          <button
            onClick={onClose}
            aria-label="Close safety panel"
            data-testid="safety-sheet-close"
            style={{ background: 'transparent', border: 'none', color: 'var(--ink-soft)', fontSize: 14, cursor: 'pointer', padding: '4px 8px', borderRadius: 4 }}
          >
            × Close
          </button>
        </div>

        {/* Grounding */}
        <section style={sectionStyle}>
          <h3 style={headingStyle}>Quick grounding (60 seconds)</h3>
          <p style={mutedStyle}>
            Try <strong>box breathing</strong>: inhale 4 · hold 4 · exhale 4 · hold 4. Repeat 3 times.
          </p>
        </section>

        {/* Safety plan */}
        <section style={sectionStyle} data-testid="safety-plan">
          <h3 style={headingStyle}>My safety plan</h3>
          <p style={mutedStyle}>This is yours. Keep it simple. You can edit it any time.</p>

          {plan.loading && <p style={mutedStyle}>Loading your plan…</p>}
          {plan.loadError && (
            <p style={{ ...mutedStyle, color: 'var(--critical)' }} data-testid="safety-plan-error">
              Couldn’t load your plan: {plan.loadError}
            </p>
          )}

          {PLAN_FIELDS.map(({ field, label, placeholder }) => (
            <label key={field} style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
              <strong style={{ fontSize: 13, color: 'var(--ink-mid)' }}>{label}</strong>
              <textarea
                value={plan.plan[field]}
                onChange={(e) => plan.setField(field, e.target.value)}
                placeholder={placeholder}
                disabled={plan.loading}
                data-testid={`safety-plan-${field}`}
                style={{
                  minHeight: 64, resize: 'vertical',
                  background: 'var(--glass-01)', border: '1px solid var(--border)',
                  color: 'var(--ink)', borderRadius: 8, padding: '8px 10px',
                  fontSize: 13, lineHeight: 1.5, fontFamily: 'inherit',
                }}
              />
            </label>
          ))}

          <div style={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', gap: 12 }}>
            <span role="status" style={{ fontSize: 12, color: 'var(--ink-soft)' }} data-testid="safety-plan-status">
              {plan.status ?? ''}
            </span>
            <button
              onClick={() => void plan.save(plan.plan)}
              disabled={plan.loading || plan.saving}
              aria-busy={plan.saving}
              data-testid="safety-plan-save"
              style={{
                background: 'var(--safe)', border: 'none', color: '#0a0e1a',
                borderRadius: 6, padding: '8px 16px', fontSize: 13, fontWeight: 600,
                cursor: plan.loading || plan.saving ? 'not-allowed' : 'pointer',
                opacity: plan.loading || plan.saving ? 0.6 : 1,
              }}
            >
              {plan.saving ? 'Saving…' : 'Save plan'}
            </button>
          </div>
        </section>

        {/* Crisis resources */}
        <section style={sectionStyle} data-testid="safety-resources">
          <h3 style={headingStyle}>Crisis resources</h3>
          <p style={mutedStyle}>If you’re in immediate danger, call your local emergency number.</p>

          {resources.loading && <p style={mutedStyle}>Loading resources…</p>}
          {resources.error && (
            <p style={{ ...mutedStyle, color: 'var(--critical)' }} data-testid="safety-resources-error">
              Couldn’t load resources: {resources.error}
            </p>
          )}

          {!resources.loading && !resources.error && (
            <ul style={{ margin: 0, paddingLeft: 20, display: 'grid', gap: 10 }} data-testid="safety-resources-list">
              {resources.resources.slice(0, LIMITS.CRISIS_RESOURCES_SHOWN).map((r, idx) => (
                <ResourceItem key={`${r.name ?? 'resource'}-${idx}`} resource={r} />
              ))}
            </ul>
          )}

          <p style={mutedStyle}>
            You can also visit <a href={ENDPOINTS.crisisPage}>{ENDPOINTS.crisisPage}</a> for a full page view.
          </p>
        </section>
      </div>
    </div>
  );
}

function ResourceItem({ resource: r }: { resource: CrisisResource }) {
  return (
    <li style={{ color: 'var(--ink)', fontSize: 13 }}>
      <strong>{r.name ?? 'Crisis support'}</strong>
      {r.description && <div style={{ color: 'var(--ink-soft)', marginTop: 2 }}>{r.description}</div>}
      <div style={{ color: 'var(--ink-soft)', marginTop: 2, display: 'flex', gap: 10, flexWrap: 'wrap' }}>
        {r.phone_number && <span>Call: {r.phone_number}</span>}
        {r.text_number && <span>Text: {r.text_number}</span>}
        {r.url && (
          <a href={r.url} target="_blank" rel="noreferrer">
            Website
          </a>
        )}
      </div>
    </li>
  );
}
