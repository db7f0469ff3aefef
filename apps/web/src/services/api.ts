// =============================================================================
// Lumen Harbor Web — API client
// Thin wrapper around fetch. Every backend call goes through requestJson so
// failures reach call sites as a single ApiError type.
// =============================================================================

import { config } from '../config.js';

class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    /** Parsed response body (or raw text when it was not JSON) */
    public readonly payload: unknown,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function resolveUrl(url: string): string {
  return url.startsWith('/') ? `${config.apiOrigin}${url}` : url;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function errorMessage(payload: unknown, status: number): string {
  if (typeof payload === 'object' && payload !== null && 'error' in payload) {
    const { error } = payload;
    if (typeof error === 'string') return error;
  }
  return `Request failed (${status})`;
}

/**
 * Performs a JSON request. Resolves with the parsed payload on 2xx; the payload
 * is not validated, the caller owns the shape assumption.
 */
export async function requestJson<T>(url: string, init: RequestInit = {}): Promise<T> {
  const headers = new Headers(init.headers);
  if (!headers.has('Content-Type')) {
    headers.set('Content-Type', 'application/json');
  }

  const response = await fetch(resolveUrl(url), { ...init, headers });
  const payload = parseBody(await response.text());

  if (!response.ok) {
    throw new ApiError(errorMessage(payload, response.status), response.status, payload);
  }

  return payload as T;
}

export const api = {
  get: <T>(path: string) => requestJson<T>(path),
  post: <T>(path: string, body: unknown) =>
    requestJson<T>(path, { method: 'POST', body: JSON.stringify(body) }),
};

export { ApiError };
