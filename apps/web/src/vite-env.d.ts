/// <reference types="vite/client" />

/**
 * Extended environment variables for the Lumen Harbor web client.
 * These are compile-time constants injected by Vite.
 */
interface ImportMetaEnv {
  /** Origin prefixed to API requests. Defaults to the page's own origin. */
  readonly VITE_API_ORIGIN?: string;

  /** Backend the dev server proxies /api and /resources/api to. */
  readonly VITE_DEV_PROXY_TARGET?: string;

  /** Sentry DSN for error reporting. If absent, Sentry is disabled. */
  readonly VITE_SENTRY_DSN?: string;

  /** Sentry release version for source map association. */
  readonly VITE_SENTRY_RELEASE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
