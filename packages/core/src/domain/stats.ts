import { z } from 'zod';

export const UserStatsSchema = z.object({
  streak: z.number().int().nonnegative(),
  totalScore: z.number().nonnegative(),
  sentenceCount: z.number().int().nonnegative(),
  lastActiveDate: z.date().nullable(),
});

export type UserStats = z.infer<typeof UserStatsSchema>;

export function emptyStats(): UserStats {
  return { streak: 0, totalScore: 0, sentenceCount: 0, lastActiveDate: null };
}

export function averageBand(stats: UserStats): number {
  if (stats.sentenceCount === 0) {
    return 0;
  }
  return stats.totalScore / stats.sentenceCount;
}

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/**
 * Whole calendar days from `from` to `to` in local time.
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  return Math.round((startOfDay(to) - startOfDay(from)) / (24 * 60 * 60 * 1000));
}

/**
 * Counts `now` as an active day. The returned stats carry `lastActiveDate = now`,
 * so refreshing twice on the same day never double counts.
 */
export function refreshStreak(stats: UserStats, now: Date): UserStats {
  let streak: number;

  if (stats.lastActiveDate === null) {
    streak = 1;
  } else {
    const days = calendarDaysBetween(stats.lastActiveDate, now);
    if (days <= 0) {
      streak = Math.max(stats.streak, 1);
    } else if (days === 1) {
      streak = stats.streak + 1;
    } else {
      streak = 1;
    }
  }

  return { ...stats, streak, lastActiveDate: now };
}

export function recordEvaluation(stats: UserStats, overallBand: number, now: Date): UserStats {
  const refreshed = refreshStreak(stats, now);
  return {
    ...refreshed,
    totalScore: refreshed.totalScore + overallBand,
    sentenceCount: refreshed.sentenceCount + 1,
  };
}
