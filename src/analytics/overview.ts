import { ValidationError } from '@/shared/errors';
import { HabitSummary, OverviewEntry, OverviewResult } from './types';

export const DEFAULT_TOP_N = 5;

function compareEntries(a: OverviewEntry, b: OverviewEntry): number {
  return (
    b.streak.currentStreak - a.streak.currentStreak ||
    a.habit.createdAt.getTime() - b.habit.createdAt.getTime() ||
    a.habit.id.localeCompare(b.habit.id)
  );
}

/**
 * Totals for a user plus their habits ranked by current streak. Habits with no
 * live streak are left out of the ranking but still counted.
 */
export function computeOverview<THabit extends HabitSummary>(
  userHabits: readonly OverviewEntry<THabit>[],
  totalCompletions: number,
  topN: number = DEFAULT_TOP_N
): OverviewResult {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new ValidationError(`Top-N must be a positive integer, got ${topN}`);
  }
  if (!Number.isInteger(totalCompletions) || totalCompletions < 0) {
    throw new ValidationError(`Total completions must be a non-negative integer, got ${totalCompletions}`);
  }

  const topStreaks = userHabits
    .filter((entry) => entry.streak.currentStreak > 0)
    .sort(compareEntries)
    .slice(0, topN)
    .map(({ habit, streak }) => ({
      habitId: habit.id,
      habitName: habit.name,
      currentStreak: streak.currentStreak,
      longestStreak: streak.longestStreak,
    }));

  return {
    totalHabits: userHabits.length,
    totalCompletions,
    topStreaks,
  };
}
