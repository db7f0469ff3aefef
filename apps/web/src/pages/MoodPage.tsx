// =============================================================================
// Lumen Harbor Web — Mood page
// Log a mood, then refresh the recent list. The refresh is issued only after
// the log request has resolved, and each list load carries a generation number
// so a slow mount-time load cannot overwrite the post-save list.
// =============================================================================

import { useCallback, useEffect, useRef, useState } from 'react';
import { format, fromUnixTime } from 'date-fns';
import { useQueryClient } from '@tanstack/react-query';
import {
  CommaListSchema,
  ENDPOINTS,
  LIMITS,
  MOOD_COLORS,
  MOOD_LABELS,
  MoodLogSchema,
  parseMoodItems,
  type MoodItem,
  type OkResponse,
} from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { queryKeys } from '../queryClient.js';
import { reportError } from '../services/telemetry.js';
import { useExperienceMode } from '../stores/experience.js';
import { PageHeader } from '../components/ui.js';
import { MoodTrendChart } from '../components/MoodTrendChart.js';

function formatTs(ts: number | undefined): string {
  return ts === undefined ? '' : format(fromUnixTime(ts), 'EEE h:mm a');
}

export const INVALID_MOOD_MESSAGE = 'Keep the note under 1000 characters and use up to 20 short tags.';

export function averageMood(items: MoodItem[]): number | null {
  if (items.length === 0) return null;
  const sum = items.reduce((acc, item) => acc + item.mood, 0);
  return Math.round((sum / items.length) * 10) / 10;
}

export function MoodPage() {
  const { mode } = useExperienceMode();
  const queryClient = useQueryClient();

  const [mood, setMood] = useState<number>(LIMITS.MOOD_DEFAULT);
  const [note, setNote] = useState('');
  const [tags, setTags] = useState('');
  const [saving, setSaving] = useState(false);
  const [status, setStatus] = useState<string | null>(null);

  const [items, setItems] = useState<MoodItem[]>([]);
  const [listLoading, setListLoading] = useState(true);
  const [listError, setListError] = useState<string | null>(null);

  const generation = useRef(0);
  const alive = useRef(true);
  useEffect(() => {
    alive.current = true;
    return () => {
      alive.current = false;
    };
  }, []);

  const loadRecent = useCallback(async (isLive: () => boolean) => {
    const id = ++generation.current;
    const current = () => isLive() && id === generation.current;
    setListLoading(true);
    try {
      const payload = await api.get<unknown>(ENDPOINTS.moodRecent(LIMITS.MOOD_PAGE_RECENT));
      if (!current()) return;
      setItems(parseMoodItems(payload));
      setListError(null);
    } catch (err) {
      if (!current()) return;
      reportError(err, 'mood.recent');
      setListError('Could not load recent moods.');
    } finally {
      if (current()) setListLoading(false);
    }
  }, []);

  useEffect(() => {
    let cancelled = false;
    void loadRecent(() => !cancelled);
    return () => {
      cancelled = true;
    };
  }, [loadRecent]);

  async function handleSave() {
    const parsed = MoodLogSchema.safeParse({ mood, note: note.trim(), tags: CommaListSchema.parse(tags) });
    if (!parsed.success) {
      setStatus(INVALID_MOOD_MESSAGE);
      return;
    }

    setSaving(true);
    setStatus('Saving…');
    try {
      await api.post<OkResponse>(ENDPOINTS.moodLog, parsed.data);
    } catch (err) {
      reportError(err, 'mood.save');
      if (alive.current) {
        setStatus('Could not save right now.');
        setSaving(false);
      }
      return;
    }
    // Home keeps its own cached list of the same moods
    void queryClient.invalidateQueries({ queryKey: queryKeys.moods });
    if (!alive.current) return;
    setStatus('Saved.');
    setNote('');
    setTags('');
    setSaving(false);
    await loadRecent(() => alive.current);
  }

  const average = averageMood(items);

  return (
    <div className="page narrow">
      <PageHeader title="Mood" description="A quick check-in. No right answers." />

      <div className="card">
        <div className="row between">
          <span className="muted">How are you feeling? ({LIMITS.MOOD_MIN}–{LIMITS.MOOD_MAX})</span>
          <strong data-testid="mood-value" style={{ color: MOOD_COLORS[mood] }}>
            {mood} · {MOOD_LABELS[mood]}
          </strong>
        </div>
        <input
          type="range"
          min={LIMITS.MOOD_MIN}
          max={LIMITS.MOOD_MAX}
          step={1}
          value={mood}
          onChange={(e) => setMood(Number(e.target.value))}
          aria-label="Mood"
          data-testid="mood-range"
        />
        <textarea
          className="field"
          placeholder="Anything you want to note? (optional)"
          value={note}
          onChange={(e) => setNote(e.target.value)}
          aria-label="Note"
          data-testid="mood-note"
        />
        {mode === 'structured' && (
          <input
            type="text"
            className="field"
            placeholder="Tags, e.g., sleep, work, family"
            value={tags}
            onChange={(e) => setTags(e.target.value)}
            aria-label="Tags"
            data-testid="mood-tags"
          />
        )}
        <div className="row between">
          <span role="status" className="muted" data-testid="mood-status">{status ?? ''}</span>
          <button
            className="btn primary"
            onClick={() => void handleSave()}
            disabled={saving}
            aria-busy={saving}
            data-testid="mood-save"
          >
            {saving ? 'Saving…' : 'Save mood'}
          </button>
        </div>
      </div>

      <div className="card">
        <div className="row between">
          <strong>Recent</strong>
          {mode === 'structured' && average !== null && (
            <span className="muted" data-testid="mood-average">Average {average.toFixed(1)}</span>
          )}
        </div>
        {mode === 'structured' && items.length > 0 && <MoodTrendChart items={items} />}
        {listLoading && items.length === 0 && <p className="muted">Loading…</p>}
        {listError && <p className="muted error" data-testid="mood-list-error">{listError}</p>}
        {!listLoading && !listError && items.length === 0 && (
          <p className="muted">Nothing logged yet.</p>
        )}
        <ul className="list" data-testid="mood-list">
          {items.map((item, idx) => (
            <li key={item.id ?? `${item.ts ?? 'mood'}-${idx}`} className="row between">
              <span>
                <strong style={{ color: MOOD_COLORS[item.mood] }}>{item.mood}</strong>
                {' '}{MOOD_LABELS[item.mood] ?? ''}
                {item.note ? ` · ${item.note}` : ''}
              </span>
              <span className="muted">{formatTs(item.ts)}</span>
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
}
