// =============================================================================
// Lumen Harbor — Shared Constants
// =============================================================================

// ---------------------------------------------------------------------------
// Mood scale
// ---------------------------------------------------------------------------

/** Short label for each mood score. */
export const MOOD_LABELS: Readonly<Record<number, string>> = {
  1: 'Terrible',
  2: 'Very low',
  3: 'Low',
  4: 'Heavy',
  5: 'Okay',
  6: 'Steady',
  7: 'Good',
  8: 'Bright',
  9: 'Great',
  10: 'Wonderful',
} as const;

/** Hex color per mood score. Gradient: red → yellow → green → indigo. */
export const MOOD_COLORS: Readonly<Record<number, string>> = {
  1: '#d62828',
  2: '#e85d04',
  3: '#f48c06',
  4: '#faa307',
  5: '#ffba08',
  6: '#a7c957',
  7: '#6a994e',
  8: '#52b788',
  9: '#3b82f6',
  10: '#6366f1',
} as const;

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export const LIMITS = {
  MOOD_MIN: 1,
  MOOD_MAX: 10,
  /** Initial position of the mood slider */
  MOOD_DEFAULT: 5,
  INTENSITY_MIN: 1,
  INTENSITY_MAX: 10,
  /** Initial intensity of a fresh thought record */
  INTENSITY_DEFAULT: 6,
  /** Crisis resources shown in the safety sheet, regardless of how many are returned */
  CRISIS_RESOURCES_SHOWN: 6,
  /** Moods shown on the home page */
  HOME_RECENT_MOODS: 5,
  /** Moods shown (and averaged) on the mood page */
  MOOD_PAGE_RECENT: 7,
} as const;

// ---------------------------------------------------------------------------
// Local storage keys (one owner per key)
// ---------------------------------------------------------------------------

export const STORAGE_KEYS = {
  journalDraft: 'lumen.journalDraft',
  experienceMode: 'lumen.experienceMode',
} as const;

// ---------------------------------------------------------------------------
// Backend endpoints
// ---------------------------------------------------------------------------

/** Crisis resources are requested for this country. */
export const CRISIS_COUNTRY = 'US';

export const ENDPOINTS = {
  crisisResources: (country: string = CRISIS_COUNTRY) =>
    `/resources/api/crisis?country=${encodeURIComponent(country)}`,
  /** Full-page crisis view served by the backend */
  crisisPage: '/resources/crisis',
  safetyPlan: '/api/v2/safety-plan',
  moodLog: '/api/v2/mood/log',
  moodRecent: (limit: number) => `/api/v2/mood/recent?limit=${limit}`,
  journalAppend: '/api/v2/journal/append',
  thoughtRecordCreate: '/api/v2/thought-record/create',
  chat: '/api/v1/chat',
  exportText: '/api/v2/export/text',
} as const;
