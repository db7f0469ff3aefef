import { describe, expect, it } from 'vitest';
import {
  ChatRequestSchema,
  CommaListSchema,
  ENDPOINTS,
  ExperienceModeSchema,
  MoodLogSchema,
  ThoughtRecordCreateSchema,
  parseCrisisResources,
  parseMoodItems,
  parseSafetyPlan,
} from '../src/index.js';

describe('CommaListSchema', () => {
  it('should split, trim and drop empty tokens', () => {
    expect(CommaListSchema.parse('sad, anxious ,  ,')).toEqual(['sad', 'anxious']);
  });

  it('should yield an empty list for blank input', () => {
    expect(CommaListSchema.parse('')).toEqual([]);
    expect(CommaListSchema.parse(' , ')).toEqual([]);
  });
});

describe('ExperienceModeSchema', () => {
  it('should accept the two modes only', () => {
    expect(ExperienceModeSchema.safeParse('gentle').success).toBe(true);
    expect(ExperienceModeSchema.safeParse('structured').success).toBe(true);
    expect(ExperienceModeSchema.safeParse('loud').success).toBe(false);
  });
});

describe('parseSafetyPlan', () => {
  it('should return null when there is no plan', () => {
    expect(parseSafetyPlan(null)).toBeNull();
    expect(parseSafetyPlan(undefined)).toBeNull();
    expect(parseSafetyPlan('plan')).toBeNull();
  });

  it('should turn missing or null fields into empty strings', () => {
    expect(parseSafetyPlan({ warningSigns: 'Not sleeping', people: null })).toEqual({
      warningSigns: 'Not sleeping',
      copingStrategies: '',
      people: '',
      places: '',
      professionalContacts: '',
    });
  });

  it('should stringify non-string values', () => {
    expect(parseSafetyPlan({ professionalContacts: 5550100 })?.professionalContacts).toBe('5550100');
  });
});

describe('parseCrisisResources', () => {
  it('should return an empty list for a malformed payload', () => {
    expect(parseCrisisResources(null)).toEqual([]);
    expect(parseCrisisResources({})).toEqual([]);
    expect(parseCrisisResources({ resources: 'none' })).toEqual([]);
  });

  it('should keep every entry and drop non-string fields', () => {
    expect(parseCrisisResources({
      resources: [
        { name: 'Helpline', phone_number: '555-0100', url: 42 },
        'junk',
      ],
    })).toEqual([
      { name: 'Helpline', phone_number: '555-0100' },
      {},
    ]);
  });
});

describe('parseMoodItems', () => {
  it('should drop items without a numeric mood and keep order', () => {
    expect(parseMoodItems({
      items: [
        { id: 2, mood: 6, note: 'Fine', ts: 1700000000 },
        { mood: 'high' },
        null,
        { id: 'x1', mood: 3, note: 17 },
      ],
    })).toEqual([
      { id: 2, mood: 6, note: 'Fine', ts: 1700000000 },
      { id: 'x1', mood: 3 },
    ]);
  });

  it('should return an empty list when items is missing', () => {
    expect(parseMoodItems({ ok: true })).toEqual([]);
    expect(parseMoodItems({ items: {} })).toEqual([]);
    expect(parseMoodItems(null)).toEqual([]);
  });
});

describe('request schemas', () => {
  it('should bound the mood score', () => {
    expect(MoodLogSchema.safeParse({ mood: 10, note: '', tags: [] }).success).toBe(true);
    expect(MoodLogSchema.safeParse({ mood: 11, note: '', tags: [] }).success).toBe(false);
    expect(MoodLogSchema.safeParse({ mood: 4.5, note: '', tags: [] }).success).toBe(false);
  });

  it('should require situation, thoughts and a valid intensity', () => {
    const record = {
      situation: 'Team meeting',
      thoughts: 'They think I am slow',
      emotions: ['worried'],
      intensity: 6,
      evidence_for: '',
      evidence_against: '',
      alternative_thought: '',
    };
    expect(ThoughtRecordCreateSchema.safeParse(record).success).toBe(true);
    expect(ThoughtRecordCreateSchema.safeParse({ ...record, situation: '  ' }).success).toBe(false);
    expect(ThoughtRecordCreateSchema.safeParse({ ...record, intensity: 0 }).success).toBe(false);
  });

  it('should trim chat messages and reject blank ones', () => {
    expect(ChatRequestSchema.parse({ message: '  hi  ' })).toEqual({ message: 'hi' });
    expect(ChatRequestSchema.safeParse({ message: ' \n ' }).success).toBe(false);
  });
});

describe('ENDPOINTS', () => {
  it('should request crisis resources for the US by default', () => {
    expect(ENDPOINTS.crisisResources()).toBe('/resources/api/crisis?country=US');
    expect(ENDPOINTS.crisisResources('New Zealand')).toBe('/resources/api/crisis?country=New%20Zealand');
  });

  it('should put the limit on the recent moods query', () => {
    expect(ENDPOINTS.moodRecent(7)).toBe('/api/v2/mood/recent?limit=7');
  });
});
