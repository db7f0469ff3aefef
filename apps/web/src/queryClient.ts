import { QueryClient } from '@tanstack/react-query';
import { LIMITS } from '@lumen-harbor/shared';

export const queryKeys = {
  /** Prefix shared by every recent-moods list, whatever its limit */
  moods: ['moods', 'recent'] as const,
  recentMoods: (limit: number = LIMITS.HOME_RECENT_MOODS) => ['moods', 'recent', limit] as const,
};

export function createQueryClient(): QueryClient {
  return new QueryClient({
    defaultOptions: {
      queries: {
        staleTime: 30_000, // 30 seconds
        retry: false, // requests are never retried
        refetchOnWindowFocus: true,
      },
      mutations: {
        retry: 0,
      },
    },
  });
}
