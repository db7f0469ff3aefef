// =============================================================================
// Lumen Harbor Web — Experience mode
// 'gentle' | 'structured' preference shared by every page. Mounted once at the
// root (main.tsx) and persisted through the local key/value store, so the
// choice survives reloads.
// =============================================================================

import { createContext, useCallback, useContext, useMemo } from 'react';
import type { ReactNode } from 'react';
import {
  DEFAULT_EXPERIENCE_MODE,
  ExperienceModeSchema,
  STORAGE_KEYS,
  type ExperienceMode,
} from '@lumen-harbor/shared';
import { useLocalStorageState } from '../hooks/useLocalStorageState.js';
import { browserStore, type KeyValueStore } from './storage.js';

interface ExperienceModeValue {
  mode: ExperienceMode;
  setMode: (mode: ExperienceMode) => void;
}

const ExperienceModeContext = createContext<ExperienceModeValue | null>(null);

export function ExperienceModeProvider({
  children,
  store = browserStore,
}: {
  children: ReactNode;
  store?: KeyValueStore;
}) {
  const [stored, setStored] = useLocalStorageState<ExperienceMode>(
    STORAGE_KEYS.experienceMode,
    DEFAULT_EXPERIENCE_MODE,
    store,
  );

  // Whatever is on disk was written by an older build or by hand
  const parsed = ExperienceModeSchema.safeParse(stored);
  const mode = parsed.success ? parsed.data : DEFAULT_EXPERIENCE_MODE;

  const setMode = useCallback((next: ExperienceMode) => setStored(next), [setStored]);
  const value = useMemo(() => ({ mode, setMode }), [mode, setMode]);

  return (
    <ExperienceModeContext.Provider value={value}>{children}</ExperienceModeContext.Provider>
  );
}

/** Throws when called outside ExperienceModeProvider. */
export function useExperienceMode(): ExperienceModeValue {
  const ctx = useContext(ExperienceModeContext);
  if (!ctx) {
    throw new Error('useExperienceMode must be used within ExperienceModeProvider');
  }
  return ctx;
}
