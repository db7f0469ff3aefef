import { describe, expect, it } from 'vitest';
import {
  LAST_STEP,
  THOUGHT_RECORD_STEPS,
  canAdvance,
  emptyThoughtRecord,
  parseThoughtRecord,
  toCreatePayload,
  type ThoughtRecordDraft,
} from '../../src/hooks/useThoughtRecordWizard.js';

function draftWith(patch: Partial<ThoughtRecordDraft>): ThoughtRecordDraft {
  return { ...emptyThoughtRecord(), ...patch };
}

describe('thought record steps', () => {
  it('should have five steps in a fixed order', () => {
    expect(THOUGHT_RECORD_STEPS).toEqual([
      'Situation',
      'Thought',
      'Emotion & intensity',
      'Evidence',
      'Alternative thought',
    ]);
    expect(LAST_STEP).toBe(4);
  });

  it('should start empty with intensity 6', () => {
    expect(emptyThoughtRecord()).toEqual({
      situation: '',
      thoughts: '',
      emotions: '',
      intensity: 6,
      evidence_for: '',
      evidence_against: '',
      alternative_thought: '',
    });
  });
});

describe('canAdvance', () => {
  it('should require a situation on step 0', () => {
    expect(canAdvance(0, draftWith({}))).toBe(false);
    expect(canAdvance(0, draftWith({ situation: '   ' }))).toBe(false);
    expect(canAdvance(0, draftWith({ situation: 'Team meeting' }))).toBe(true);
  });

  it('should require a thought on step 1', () => {
    expect(canAdvance(1, draftWith({ situation: 'Team meeting' }))).toBe(false);
    expect(canAdvance(1, draftWith({ thoughts: 'They think I am slow' }))).toBe(true);
  });

  it('should require emotions on step 2', () => {
    expect(canAdvance(2, draftWith({ emotions: '\n' }))).toBe(false);
    expect(canAdvance(2, draftWith({ emotions: 'worried' }))).toBe(true);
  });

  it('should never block on evidence or the alternative thought', () => {
    expect(canAdvance(3, emptyThoughtRecord())).toBe(true);
    expect(canAdvance(4, emptyThoughtRecord())).toBe(true);
  });
});

describe('toCreatePayload', () => {
  it('should split emotions on commas and drop empty entries', () => {
    const payload = toCreatePayload(draftWith({
      situation: 'Team meeting',
      thoughts: 'They think I am slow',
      emotions: 'sad, anxious ,  ,',
      intensity: 8,
    }));

    expect(payload).toEqual({
      situation: 'Team meeting',
      thoughts: 'They think I am slow',
      emotions: ['sad', 'anxious'],
      intensity: 8,
      evidence_for: '',
      evidence_against: '',
      alternative_thought: '',
    });
  });

  it('should send an empty list when no emotion survives trimming', () => {
    expect(toCreatePayload(draftWith({ emotions: ' , ' })).emotions).toEqual([]);
  });
});

describe('parseThoughtRecord', () => {
  it('should return the request body for a complete draft', () => {
    expect(parseThoughtRecord(draftWith({
      situation: '  Team meeting ',
      thoughts: 'They think I am slow',
      emotions: 'worried',
    }))).toEqual({
      situation: 'Team meeting',
      thoughts: 'They think I am slow',
      emotions: ['worried'],
      intensity: 6,
      evidence_for: '',
      evidence_against: '',
      alternative_thought: '',
    });
  });

  it('should reject a draft without a situation or thought', () => {
    expect(parseThoughtRecord(draftWith({ thoughts: 'They think I am slow' }))).toBeNull();
    expect(parseThoughtRecord(draftWith({ situation: 'Team meeting', thoughts: ' ' }))).toBeNull();
  });

  it('should reject an intensity off the scale', () => {
    expect(parseThoughtRecord(draftWith({ situation: 'Team meeting', thoughts: 'Slow', intensity: 11 }))).toBeNull();
  });
});
