import type { DateKey } from '@/utils/dates';

export const FREQUENCIES = ['daily', 'weekly', 'monthly'] as const;

export type Frequency = (typeof FREQUENCIES)[number];

export interface StreakResult {
  habitId: string;
  currentStreak: number;
  longestStreak: number;
  asOf: DateKey;
}

/** The fields of a habit the analytics engine reads. */
export interface HabitSummary {
  id: string;
  name: string;
  frequency: Frequency;
  createdAt: Date;
}

export interface OverviewEntry<THabit extends HabitSummary = HabitSummary> {
  habit: THabit;
  streak: StreakResult;
}

export interface RankedHabit {
  habitId: string;
  habitName: string;
  currentStreak: number;
  longestStreak: number;
}

export interface OverviewResult {
  totalHabits: number;
  totalCompletions: number;
  topStreaks: RankedHabit[];
}

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export type WeekdayDistribution = Record<Weekday, number>;

/** Inclusive bounds; either side may be open. */
export interface DateRange {
  from?: DateKey;
  to?: DateKey;
}

export interface HabitCompletionLog<THabit extends HabitSummary = HabitSummary> {
  habit: THabit;
  completionDates: DateKey[];
}

/**
 * Read side of the completion store. Dates come back ascending and unique;
 * uniqueness is enforced when completions are written.
 */
export interface CompletionLogAccessor<THabit extends HabitSummary = HabitSummary> {
  /** Throws NotFoundError when the habit is missing or owned by someone else. */
  listCompletionDates(ownerId: string, habitId: string, range?: DateRange): Promise<DateKey[]>;
  /** Every habit of the owner, oldest first, each with its completion dates. */
  listUserCompletionLogs(ownerId: string): Promise<HabitCompletionLog<THabit>[]>;
}
