// =============================================================================
// Lumen Harbor — Zod Schemas
// Request payloads sent by the web client, and boundary coercion for the loosely
// shaped JSON the backend returns (safety plan, crisis resources, recent moods).
// =============================================================================

import { z } from 'zod';
import { LIMITS } from '../constants/index.js';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const MoodScoreSchema = z
  .number()
  .int()
  .min(LIMITS.MOOD_MIN)
  .max(LIMITS.MOOD_MAX);

export const IntensitySchema = z
  .number()
  .int()
  .min(LIMITS.INTENSITY_MIN)
  .max(LIMITS.INTENSITY_MAX);

/** "sad, anxious ,  " → ["sad", "anxious"] */
export const CommaListSchema = z
  .string()
  .transform((text) =>
    text
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean),
  );

/** Best-effort stringification: null/undefined become '', anything else goes through String(). */
const LooseTextSchema = z.preprocess(
  (value) => (value === null || value === undefined ? '' : String(value)),
  z.string(),
);

/** Keeps strings, drops everything else. */
const OptionalTextSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value : undefined),
  z.string().optional(),
);

// ---------------------------------------------------------------------------
// Experience mode
// ---------------------------------------------------------------------------

export const ExperienceModeSchema = z.enum(['gentle', 'structured']);
export type ExperienceMode = z.infer<typeof ExperienceModeSchema>;

export const DEFAULT_EXPERIENCE_MODE: ExperienceMode = 'gentle';

// ---------------------------------------------------------------------------
// Safety plan
// ---------------------------------------------------------------------------

export const SafetyPlanSchema = z.object({
  warningSigns: LooseTextSchema,
  copingStrategies: LooseTextSchema,
  people: LooseTextSchema,
  places: LooseTextSchema,
  professionalContacts: LooseTextSchema,
});
export type SafetyPlan = z.infer<typeof SafetyPlanSchema>;

export const EMPTY_SAFETY_PLAN: Readonly<SafetyPlan> = {
  warningSigns: '',
  copingStrategies: '',
  people: '',
  places: '',
  professionalContacts: '',
};

/**
 * Coerces the `plan` member of a safety-plan response. Returns null when the
 * backend has no plan (or sent something that is not an object).
 */
export function parseSafetyPlan(raw: unknown): SafetyPlan | null {
  const result = SafetyPlanSchema.safeParse(raw);
  return result.success ? result.data : null;
}

// ---------------------------------------------------------------------------
// Crisis resources
// ---------------------------------------------------------------------------

export const CrisisResourceSchema = z
  .object({
    name: OptionalTextSchema,
    description: OptionalTextSchema,
    phone_number: OptionalTextSchema,
    text_number: OptionalTextSchema,
    url: OptionalTextSchema,
  })
  .catch({});
export type CrisisResource = z.infer<typeof CrisisResourceSchema>;

const CrisisResourcesResponseSchema = z
  .object({ resources: z.array(CrisisResourceSchema).catch([]) })
  .catch({ resources: [] });

export function parseCrisisResources(payload: unknown): CrisisResource[] {
  return CrisisResourcesResponseSchema.parse(payload).resources;
}

// ---------------------------------------------------------------------------
// Mood
// ---------------------------------------------------------------------------

export const MoodLogSchema = z.object({
  mood: MoodScoreSchema,
  note: z.string().max(1000),
  tags: z.array(z.string().min(1).max(50)).max(20),
});
export type MoodLogInput = z.infer<typeof MoodLogSchema>;

export const MoodItemSchema = z.object({
  id: z.union([z.string(), z.number()]).optional().catch(undefined),
  mood: z.number(),
  note: z.string().optional().catch(undefined),
  tags: z.array(z.string()).optional().catch(undefined),
  ts: z.number().optional().catch(undefined),
});
export type MoodItem = z.infer<typeof MoodItemSchema>;

/** Items without a numeric mood are dropped; the rest keep their order. */
export function parseMoodItems(payload: unknown): MoodItem[] {
  if (typeof payload !== 'object' || payload === null || !('items' in payload)) return [];
  const { items } = payload;
  if (!Array.isArray(items)) return [];
  const parsed: MoodItem[] = [];
  for (const item of items) {
    const result = MoodItemSchema.safeParse(item);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Journal & thought records
// ---------------------------------------------------------------------------

export const JournalAppendSchema = z.object({
  text: z.string().trim().min(1),
  tags: z.array(z.string()).max(20),
});
export type JournalAppendInput = z.infer<typeof JournalAppendSchema>;

export const ThoughtRecordCreateSchema = z.object({
  situation: z.string().trim().min(1),
  thoughts: z.string().trim().min(1),
  emotions: z.array(z.string().min(1)),
  intensity: IntensitySchema,
  evidence_for: z.string(),
  evidence_against: z.string(),
  alternative_thought: z.string(),
});
export type ThoughtRecordCreateInput = z.infer<typeof ThoughtRecordCreateSchema>;

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
