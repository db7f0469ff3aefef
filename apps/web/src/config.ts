// =============================================================================
// Lumen Harbor Web — Runtime configuration
// Compile-time constants injected by Vite. Everything is optional; the app runs
// against the same origin with error reporting disabled when nothing is set.
// =============================================================================

function optional(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value.trim() : fallback;
}

export const config = {
  /** Prefixed to relative request URLs. Empty = same origin (Vite proxy in dev). */
  apiOrigin: optional(import.meta.env.VITE_API_ORIGIN, '').replace(/\/+$/, ''),

  sentryDsn: optional(import.meta.env.VITE_SENTRY_DSN, ''),
  sentryRelease: optional(import.meta.env.VITE_SENTRY_RELEASE, ''),

  mode: import.meta.env.MODE,
  isProd: import.meta.env.PROD,
  isDev: import.meta.env.DEV,
} as const;
