// =============================================================================
// Lumen Harbor Web — useThoughtRecordWizard hook
// Five fixed steps, strictly linear. Steps 0–2 each have one required field;
// evidence and the alternative thought never block progress.
// =============================================================================

import { useCallback, useState } from 'react';
import {
  CommaListSchema,
  ENDPOINTS,
  LIMITS,
  ThoughtRecordCreateSchema,
  type ThoughtRecordCreateInput,
  type ThoughtRecordCreateResponse,
} from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { reportError } from '../services/telemetry.js';

export interface ThoughtRecordDraft {
  situation: string;
  thoughts: string;
  /** Comma-separated free text; split on submit */
  emotions: string;
  intensity: number;
  evidence_for: string;
  evidence_against: string;
  alternative_thought: string;
}

export const THOUGHT_RECORD_STEPS = [
  'Situation',
  'Thought',
  'Emotion & intensity',
  'Evidence',
  'Alternative thought',
] as const;

export const LAST_STEP = THOUGHT_RECORD_STEPS.length - 1;

export const SAVED_MESSAGE = 'Saved. You can come back to this later.';
export const SAVE_FAILED_MESSAGE = 'Could not save right now.';
export const INCOMPLETE_MESSAGE = 'Add the situation and the thought before saving.';

export function emptyThoughtRecord(): ThoughtRecordDraft {
  return {
    situation: '',
    thoughts: '',
    emotions: '',
    intensity: LIMITS.INTENSITY_DEFAULT,
    evidence_for: '',
    evidence_against: '',
    alternative_thought: '',
  };
}

const REQUIRED_BY_STEP: Partial<Record<number, keyof ThoughtRecordDraft>> = {
  0: 'situation',
  1: 'thoughts',
  2: 'emotions',
};

export function canAdvance(step: number, draft: ThoughtRecordDraft): boolean {
  const field = REQUIRED_BY_STEP[step];
  if (!field) return true;
  return String(draft[field]).trim().length > 0;
}

export function toCreatePayload(draft: ThoughtRecordDraft): ThoughtRecordCreateInput {
  return { ...draft, emotions: CommaListSchema.parse(draft.emotions) };
}

/** The request body, or null when the draft would be rejected. */
export function parseThoughtRecord(draft: ThoughtRecordDraft): ThoughtRecordCreateInput | null {
  const result = ThoughtRecordCreateSchema.safeParse(toCreatePayload(draft));
  return result.success ? result.data : null;
}

export function useThoughtRecordWizard() {
  const [step, setStep] = useState(0);
  const [draft, setDraft] = useState<ThoughtRecordDraft>(emptyThoughtRecord);
  const [saving, setSaving] = useState(false);
  const [status, setStatus] = useState<string | null>(null);

  const update = useCallback(<K extends keyof ThoughtRecordDraft>(field: K, value: ThoughtRecordDraft[K]) => {
    setDraft((d) => ({ ...d, [field]: value }));
  }, []);

  const back = useCallback(() => setStep((s) => Math.max(0, s - 1)), []);

  const next = useCallback(() => {
    if (!canAdvance(step, draft)) return;
    setStep((s) => Math.min(LAST_STEP, s + 1));
  }, [step, draft]);

  const save = useCallback(async () => {
    const payload = parseThoughtRecord(draft);
    if (!payload) {
      setStatus(INCOMPLETE_MESSAGE);
      return;
    }

    setSaving(true);
    setStatus(null);
    try {
      await api.post<ThoughtRecordCreateResponse>(ENDPOINTS.thoughtRecordCreate, payload);
      setStatus(SAVED_MESSAGE);
      setStep(0);
      setDraft(emptyThoughtRecord());
    } catch (err) {
      reportError(err, 'journal.thoughtRecord.save');
      setStatus(SAVE_FAILED_MESSAGE);
    } finally {
      setSaving(false);
    }
  }, [draft]);

  return {
    step,
    title: THOUGHT_RECORD_STEPS[step] ?? THOUGHT_RECORD_STEPS[0],
    isLastStep: step === LAST_STEP,
    canGoBack: step > 0,
    canGoNext: canAdvance(step, draft),
    draft,
    update,
    back,
    next,
    save,
    saving,
    status,
  };
}
