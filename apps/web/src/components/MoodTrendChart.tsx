import {
  ResponsiveContainer,
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip as RechartsTooltip,
} from 'recharts';
import { format, fromUnixTime } from 'date-fns';
import { LIMITS, type MoodItem } from '@lumen-harbor/shared';

const BORDER = 'var(--border)';
const SUB = 'var(--ink-soft)';
const PRIMARY = '#2a9d8f';

interface TrendPoint {
  ts: number;
  mood: number;
}

/** Oldest first; items without a timestamp cannot be placed on the axis. */
export function toTrendPoints(items: MoodItem[]): TrendPoint[] {
  const points: TrendPoint[] = [];
  for (const item of items) {
    if (item.ts !== undefined) points.push({ ts: item.ts, mood: item.mood });
  }
  return points.sort((a, b) => a.ts - b.ts);
}

export function MoodTrendChart({ items }: { items: MoodItem[] }) {
  const data = toTrendPoints(items);

  if (data.length < 2) {
    return (
      <p className="muted" data-testid="mood-trend-empty">
        A trend appears after two check-ins.
      </p>
    );
  }

  return (
    <div data-testid="mood-trend" style={{ width: '100%', height: 180 }}>
      <ResponsiveContainer width="100%" height={180}>
        <LineChart data={data} margin={{ top: 5, right: 16, bottom: 5, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" stroke={BORDER} />
          <XAxis
            dataKey="ts"
            tick={{ fill: SUB, fontSize: 11 }}
            tickLine={false}
            axisLine={{ stroke: BORDER }}
            tickFormatter={(v: number) => format(fromUnixTime(v), 'EEE')}
            interval="preserveStartEnd"
          />
          <YAxis
            domain={[LIMITS.MOOD_MIN, LIMITS.MOOD_MAX]}
            ticks={[2, 4, 6, 8, 10]}
            tick={{ fill: SUB, fontSize: 11 }}
            tickLine={false}
            axisLine={{ stroke: BORDER }}
            width={28}
          />
          <RechartsTooltip
            labelFormatter={(v: number) => format(fromUnixTime(v), 'EEE, MMM d · h:mm a')}
            formatter={(v: number) => [v, 'Mood']}
          />
          <Line
            type="monotone"
            dataKey="mood"
            stroke={PRIMARY}
            strokeWidth={2}
            dot={{ r: 4, fill: PRIMARY, strokeWidth: 0 }}
            activeDot={{ r: 6, fill: PRIMARY }}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
