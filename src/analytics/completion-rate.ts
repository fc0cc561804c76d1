import { InvalidStateError } from '@/shared/errors';
import { DateKey, toDateKey, toDayNumber } from '@/utils/dates';
import { assertFrequency, collectPeriods, periodIndex, resolveAsOf } from './periods';

/**
 * Share of periods since the habit was created, creation period and as-of
 * period included, that hold at least one completion. Always in [0, 1].
 */
export function computeCompletionRate(
  habitCreatedAt: Date | DateKey,
  frequency: string,
  completionDates: readonly DateKey[],
  asOfDate?: DateKey
): number {
  const cadence = assertFrequency(frequency);
  const createdOn = typeof habitCreatedAt === 'string' ? habitCreatedAt : toDateKey(habitCreatedAt);
  const asOf = resolveAsOf(asOfDate);

  const createdDay = toDayNumber(createdOn);
  const asOfDay = toDayNumber(asOf);

  if (asOfDay < createdDay) {
    throw new InvalidStateError(
      `As-of date ${asOf} precedes habit creation date ${createdOn}`,
      'AS_OF_BEFORE_CREATION'
    );
  }

  const firstPeriod = periodIndex(createdDay, cadence);
  const expected = Math.max(1, periodIndex(asOfDay, cadence) - firstPeriod + 1);
  const completed = collectPeriods(completionDates, cadence, asOfDay)
    .filter((period) => period >= firstPeriod).length;

  return Math.min(1, Math.max(0, completed / expected));
}

/** Rate as a percentage rounded to two decimals, for display. */
export function toPercentage(rate: number): number {
  return Math.round(rate * 10000) / 100;
}
