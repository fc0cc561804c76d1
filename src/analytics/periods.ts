import { InvalidStateError } from '@/shared/errors';
import { DateKey, toDateKey, toDayNumber } from '@/utils/dates';
import { FREQUENCIES, Frequency } from './types';

/** Fixed window lengths; months are 30 days regardless of the calendar. */
export const PERIOD_LENGTH_DAYS: Readonly<Record<Frequency, number>> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

// 1970-01-05, a Monday, so weekly windows line up with ISO weeks
export const PERIOD_ANCHOR_DAY = 4;

export function isFrequency(value: unknown): value is Frequency {
  return FREQUENCIES.some((frequency) => frequency === value);
}

export function assertFrequency(value: string): Frequency {
  if (!isFrequency(value)) {
    throw new InvalidStateError(
      `Unknown frequency "${value}"; expected one of ${FREQUENCIES.join(', ')}`,
      'INVALID_FREQUENCY'
    );
  }
  return value;
}

export function periodIndex(dayNumber: number, frequency: Frequency): number {
  return Math.floor((dayNumber - PERIOD_ANCHOR_DAY) / PERIOD_LENGTH_DAYS[frequency]);
}

export function resolveAsOf(asOfDate?: DateKey): DateKey {
  return asOfDate ?? toDateKey(new Date());
}

/**
 * Distinct, ascending period indices of the completions on or before
 * `lastDay`. Input must be strictly ascending.
 */
export function collectPeriods(
  completionDates: readonly DateKey[],
  frequency: Frequency,
  lastDay: number
): number[] {
  const periods: number[] = [];
  let previous: { date: DateKey; day: number } | undefined;

  for (const date of completionDates) {
    const day = toDayNumber(date);
    if (previous && day <= previous.day) {
      throw new InvalidStateError(
        `Completion dates must be strictly ascending; ${date} follows ${previous.date}`,
        'UNORDERED_COMPLETIONS'
      );
    }
    previous = { date, day };

    if (day > lastDay) continue;

    const period = periodIndex(day, frequency);
    if (periods[periods.length - 1] !== period) {
      periods.push(period);
    }
  }

  return periods;
}
