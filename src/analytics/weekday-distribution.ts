import { DateKey, dayOfWeek, toDayNumber } from '@/utils/dates';
import { resolveAsOf } from './periods';
import { Weekday, WeekdayDistribution } from './types';

export const WEEKDAY_WINDOW_DAYS = 28;

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

/** Completions per day of week over the four weeks ending on the as-of date. */
export function computeWeekdayDistribution(
  completionDates: readonly DateKey[],
  asOfDate?: DateKey
): WeekdayDistribution {
  const asOfDay = toDayNumber(resolveAsOf(asOfDate));
  const firstDay = asOfDay - WEEKDAY_WINDOW_DAYS + 1;
  const counts: WeekdayDistribution = { 0: 0, 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0 };

  for (const date of completionDates) {
    const day = toDayNumber(date);
    if (day < firstDay || day > asOfDay) continue;
    counts[WEEKDAYS[dayOfWeek(date)]] += 1;
  }

  return counts;
}
