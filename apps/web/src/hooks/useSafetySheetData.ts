// =============================================================================
// Lumen Harbor Web — Safety sheet data hooks
// The sheet mounts these when it opens and unmounts them when it closes. Each
// fetch runs in its own effect with its own `cancelled` flag, so one failing or
// resolving late never affects the other, and nothing is committed after close.
// =============================================================================

import { useCallback, useEffect, useRef, useState } from 'react';
import {
  EMPTY_SAFETY_PLAN,
  ENDPOINTS,
  parseCrisisResources,
  parseSafetyPlan,
  type CrisisResource,
  type SafetyPlan,
  type SafetyPlanResponse,
} from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { describeError, reportError } from '../services/telemetry.js';

export type SafetyPlanField = keyof SafetyPlan;

// ---------------------------------------------------------------------------
// Crisis resources: fetched fresh on every open
// ---------------------------------------------------------------------------

export function useCrisisResources() {
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [resources, setResources] = useState<CrisisResource[]>([]);

  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);

    void api.get<unknown>(ENDPOINTS.crisisResources())
      .then((payload) => {
        if (cancelled) return;
        setResources(parseCrisisResources(payload));
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        reportError(err, 'safety.resources');
        setError(describeError(err, 'Failed to load resources'));
      })
      .finally(() => {
        if (cancelled) return;
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, []);

  return { loading, error, resources };
}

// ---------------------------------------------------------------------------
// Safety plan: loaded on open, saved only on explicit request
// ---------------------------------------------------------------------------

export function useSafetyPlan() {
  const [plan, setPlan] = useState<SafetyPlan>({ ...EMPTY_SAFETY_PLAN });
  const [loading, setLoading] = useState(true);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [saving, setSaving] = useState(false);
  const [status, setStatus] = useState<string | null>(null);

  // Guards the save completion, which is not tied to an effect
  const alive = useRef(true);
  useEffect(() => {
    alive.current = true;
    return () => {
      alive.current = false;
    };
  }, []);

  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setLoadError(null);

    void api.get<SafetyPlanResponse>(ENDPOINTS.safetyPlan)
      .then((res) => {
        if (cancelled) return;
        const loaded = parseSafetyPlan(res?.plan);
        if (loaded) setPlan(loaded);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        reportError(err, 'safety.plan.load');
        setLoadError(describeError(err, 'Failed to load your plan'));
      })
      .finally(() => {
        if (cancelled) return;
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, []);

  const setField = useCallback((field: SafetyPlanField, value: string) => {
    setPlan((p) => ({ ...p, [field]: value }));
    // A previous "Saved." no longer describes what is on screen
    setStatus(null);
  }, []);

  const save = useCallback(async (current: SafetyPlan) => {
    setSaving(true);
    setStatus(null);
    try {
      await api.post(ENDPOINTS.safetyPlan, current);
      if (alive.current) setStatus('Saved.');
    } catch (err) {
      reportError(err, 'safety.plan.save');
      if (alive.current) setStatus('Could not save right now.');
    } finally {
      if (alive.current) setSaving(false);
    }
  }, []);

  return { plan, setField, loading, loadError, saving, status, save };
}
