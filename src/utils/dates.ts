import { ValidationError } from '@/shared/errors';

export const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Calendar date in `YYYY-MM-DD` form, interpreted in UTC. */
export type DateKey = string;

export function isDateKey(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  // Rejects rollovers such as 2025-02-30
  return parsed.toISOString().slice(0, 10) === value;
}

/** Days since 1970-01-01 for a calendar date. */
export function toDayNumber(key: DateKey): number {
  if (!isDateKey(key)) {
    throw new ValidationError(`Invalid calendar date: ${key}`, 'INVALID_DATE');
  }
  return Math.round(Date.parse(`${key}T00:00:00.000Z`) / DAY_MS);
}

export function fromDayNumber(dayNumber: number): DateKey {
  return new Date(dayNumber * DAY_MS).toISOString().slice(0, 10);
}

export function toDateKey(date: Date): DateKey {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError('Invalid date', 'INVALID_DATE');
  }
  return date.toISOString().slice(0, 10);
}

export function addDays(key: DateKey, days: number): DateKey {
  return fromDayNumber(toDayNumber(key) + days);
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(key: DateKey): number {
  return new Date(toDayNumber(key) * DAY_MS).getUTCDay();
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
