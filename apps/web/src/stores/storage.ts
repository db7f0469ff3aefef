// =============================================================================
// Lumen Harbor Web — Local key/value store
// Every local persistence consumer (journal draft, experience mode) goes through
// this narrow interface. Storage failures never reach callers: reads fall back
// to the supplied initial value and writes are dropped, leaving in-memory state
// as the source of truth for the session.
// =============================================================================

export interface KeyValueStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
}

/** localStorage, resolved lazily so private-mode SecurityErrors surface as thrown calls. */
export const browserStore: KeyValueStore = {
  get: (key) => window.localStorage.getItem(key),
  set: (key, value) => window.localStorage.setItem(key, value),
};

export function createMemoryStore(seed: Record<string, string> = {}): KeyValueStore {
  const data = new Map(Object.entries(seed));
  return {
    get: (key) => data.get(key) ?? null,
    set: (key, value) => { data.set(key, value); },
  };
}

export function readPersisted<T>(store: KeyValueStore, key: string, initial: T): T {
  try {
    const raw = store.get(key);
    return raw === null ? initial : (JSON.parse(raw) as T);
  } catch {
    // Unavailable store or corrupt JSON: start from the default
    return initial;
  }
}

export function writePersisted<T>(store: KeyValueStore, key: string, value: T): void {
  try {
    store.set(key, JSON.stringify(value));
  } catch {
    // Quota exceeded or storage disabled; state stays in memory only
  }
}
