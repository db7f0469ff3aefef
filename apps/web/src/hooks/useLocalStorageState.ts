// =============================================================================
// Lumen Harbor Web — useLocalStorageState hook
// useState that mirrors its value to the local key/value store under `key`.
// =============================================================================

import { useEffect, useState } from 'react';
import type { Dispatch, SetStateAction } from 'react';
import { browserStore, readPersisted, writePersisted, type KeyValueStore } from '../stores/storage.js';

export function useLocalStorageState<T>(
  key: string,
  initial: T,
  store: KeyValueStore = browserStore,
): [T, Dispatch<SetStateAction<T>>] {
  const [value, setValue] = useState<T>(() => readPersisted(store, key, initial));

  useEffect(() => {
    writePersisted(store, key, value);
  }, [store, key, value]);

  return [value, setValue];
}
