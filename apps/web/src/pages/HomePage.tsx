import { Link } from 'react-router-dom';
import { useQuery } from '@tanstack/react-query';
import { ENDPOINTS, LIMITS, MOOD_COLORS, MOOD_LABELS, parseMoodItems } from '@lumen-harbor/shared';
import { api } from '../services/api.js';
import { queryKeys } from '../queryClient.js';
import { useExperienceMode } from '../stores/experience.js';
import { PageHeader } from '../components/ui.js';

export function HomePage() {
  const { mode } = useExperienceMode();

  const { data: moods = [], isPending, isError } = useQuery({
    queryKey: queryKeys.recentMoods(LIMITS.HOME_RECENT_MOODS),
    queryFn: async () => parseMoodItems(await api.get<unknown>(ENDPOINTS.moodRecent(LIMITS.HOME_RECENT_MOODS))),
  });

  const latest = moods[0];

  return (
    <div className="page narrow">
      <PageHeader title="Welcome back" description="Take what you need. Leave the rest." />

      <div className="card" data-testid="home-moods">
        <strong>{mode === 'gentle' ? 'Latest check-in' : 'Recent moods'}</strong>
        {isPending && <p className="muted">Loading…</p>}
        {isError && <p className="muted error" data-testid="home-moods-error">Could not load recent moods.</p>}
        {!isPending && !isError && !latest && (
          <p className="muted">
            No check-ins yet. <Link to="/mood">Log your mood</Link>
          </p>
        )}

        {latest && mode === 'gentle' && (
          <p data-testid="home-latest">
            <strong style={{ color: MOOD_COLORS[latest.mood] }}>{latest.mood}</strong>
            {' · '}{MOOD_LABELS[latest.mood] ?? ''}
          </p>
        )}

        {latest && mode === 'structured' && (
          <ul className="list" data-testid="home-list">
            {moods.map((m, idx) => (
              <li key={m.id ?? idx} className="row between">
                <span>
                  <strong style={{ color: MOOD_COLORS[m.mood] }}>{m.mood}</strong>
                  {' '}{MOOD_LABELS[m.mood] ?? ''}
                </span>
                <span className="muted">{m.note ?? ''}</span>
              </li>
            ))}
          </ul>
        )}
      </div>

      <div className="card row">
        <Link className="btn" to="/talk">Talk it through</Link>
        <Link className="btn" to="/journal">Write in the journal</Link>
      </div>
    </div>
  );
}
