import { ValidationError } from '@/shared/errors';
import { DateKey, toDayNumber } from '@/utils/dates';
import { assertFrequency, collectPeriods, periodIndex, resolveAsOf } from './periods';
import { StreakResult } from './types';

/**
 * Missed periods a streak survives. Zero means the habit has to be done in the
 * as-of period or the one right before it, and every earlier period of the run
 * must hold a completion.
 */
export const DEFAULT_GRACE_PERIODS = 0;

export interface StreakOptions {
  gracePeriods?: number;
}

/**
 * Current and longest runs of consecutive completed periods.
 *
 * The current streak ends at the newest completed period, provided that period
 * is the as-of period or lies within `gracePeriods + 1` periods before it;
 * otherwise it is 0. Completions dated after the as-of date are not counted.
 */
export function computeStreak(
  habitId: string,
  frequency: string,
  completionDates: readonly DateKey[],
  asOfDate?: DateKey,
  options: StreakOptions = {}
): StreakResult {
  const cadence = assertFrequency(frequency);
  const asOf = resolveAsOf(asOfDate);
  const gracePeriods = options.gracePeriods ?? DEFAULT_GRACE_PERIODS;

  if (!Number.isInteger(gracePeriods) || gracePeriods < 0) {
    throw new ValidationError(`Grace periods must be a non-negative integer, got ${gracePeriods}`);
  }

  const asOfDay = toDayNumber(asOf);
  const periods = collectPeriods(completionDates, cadence, asOfDay);
  const maxStep = gracePeriods + 1;

  let longestStreak = 0;
  let run = 0;
  let newest: number | undefined;

  for (const period of periods) {
    run = newest !== undefined && period - newest <= maxStep ? run + 1 : 1;
    // strict comparison keeps the earliest of equally long runs
    if (run > longestStreak) longestStreak = run;
    newest = period;
  }

  const alive = newest !== undefined && periodIndex(asOfDay, cadence) - newest <= maxStep;

  return {
    habitId,
    currentStreak: alive ? run : 0,
    longestStreak,
    asOf,
  };
}
