// =============================================================================
// Lumen Harbor Web — Error reporting
// Caught remote failures are logged to the console and forwarded to Sentry.
// captureException is a no-op until Sentry.init() has run (see main.tsx).
// =============================================================================

import * as Sentry from '@sentry/react';
import { ApiError } from './api.js';

/**
 * @param context short tag naming the widget that caught the error, e.g. 'mood.save'
 */
export function reportError(error: unknown, context: string): void {
  console.error(`[lumen] ${context}`, error);
  Sentry.captureException(error, {
    tags: { context },
    extra: error instanceof ApiError ? { status: error.status } : undefined,
  });
}

/** Message for inline display: ApiError messages come from the backend, anything else is generic. */
export function describeError(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}
