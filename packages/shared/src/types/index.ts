// =============================================================================
// Lumen Harbor — Shared API Types
// Response envelopes returned by the backend. Payloads that need boundary coercion
// (safety plan, crisis resources, moods) are Zod-derived in schemas/index.ts.
// =============================================================================

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** Generic acknowledgement. The backend adds endpoint-specific members. */
export interface OkResponse {
  ok: boolean;
  [key: string]: unknown;
}

export interface SafetyPlanResponse {
  ok: boolean;
  /** Unvalidated; pass through parseSafetyPlan() */
  plan: unknown;
}

export interface ThoughtRecordCreateResponse {
  ok: boolean;
  record: { id: string | number; ts: number };
}

export interface ChatResponse {
  response: string;
}

export interface ExportTextResponse {
  ok: boolean;
  text: string;
}

// ---------------------------------------------------------------------------
// Client-only
// ---------------------------------------------------------------------------

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  text: string;
}
