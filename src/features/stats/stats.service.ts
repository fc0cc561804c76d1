import {
  CompletionLogAccessor,
  OverviewResult,
  StreakResult,
  WeekdayDistribution,
  WEEKDAY_WINDOW_DAYS,
  computeCompletionRate,
  computeOverview,
  computeStreak,
  computeWeekdayDistribution,
  toPercentage,
} from '@/analytics';
import { NotFoundError } from '@/shared/errors';
import { AnalyticsSettings, Habit } from '@/shared/types';
import { Clock, DateKey, addDays, toDateKey } from '@/utils/dates';
import { HabitsRepository } from '@/features/habits/habits.repository';

export interface HabitStats extends StreakResult {
  habitName: string;
  frequency: Habit['frequency'];
  completionRate: number;
  completionPercentage: number;
  totalCompletions: number;
}

export interface OverviewStats extends OverviewResult {
  asOf: DateKey;
}

export interface WeekdayStats {
  habitId: string;
  from: DateKey;
  to: DateKey;
  counts: WeekdayDistribution;
}

export class StatsService {
  constructor(
    private readonly habits: HabitsRepository,
    private readonly completionLog: CompletionLogAccessor<Habit>,
    private readonly settings: AnalyticsSettings,
    private readonly clock: Clock
  ) {}

  async getHabitStats(ownerId: string, habitId: string, asOfDate?: DateKey): Promise<HabitStats> {
    const habit = await this.habits.findOwned(ownerId, habitId);

    if (!habit) {
      throw new NotFoundError('Habit');
    }

    const asOf = asOfDate ?? this.today();
    const dates = await this.completionLog.listCompletionDates(ownerId, habit.id, { to: asOf });

    const completionRate = computeCompletionRate(habit.createdAt, habit.frequency, dates, asOf);
    const streak = computeStreak(habit.id, habit.frequency, dates, asOf, {
      gracePeriods: this.settings.gracePeriods,
    });

    return {
      ...streak,
      habitName: habit.name,
      frequency: habit.frequency,
      completionRate,
      completionPercentage: toPercentage(completionRate),
      totalCompletions: dates.length,
    };
  }

  async getOverview(ownerId: string, asOfDate?: DateKey, limit?: number): Promise<OverviewStats> {
    const asOf = asOfDate ?? this.today();
    const logs = await this.completionLog.listUserCompletionLogs(ownerId);

    const entries = logs.map(({ habit, completionDates }) => ({
      habit,
      streak: computeStreak(habit.id, habit.frequency, completionDates, asOf, {
        gracePeriods: this.settings.gracePeriods,
      }),
    }));
    const totalCompletions = logs.reduce((sum, log) => sum + log.completionDates.length, 0);

    return {
      ...computeOverview(entries, totalCompletions, limit ?? this.settings.overviewTopN),
      asOf,
    };
  }

  async getWeekdayDistribution(ownerId: string, habitId: string, asOfDate?: DateKey): Promise<WeekdayStats> {
    const to = asOfDate ?? this.today();
    const from = addDays(to, -(WEEKDAY_WINDOW_DAYS - 1));
    const dates = await this.completionLog.listCompletionDates(ownerId, habitId, { from, to });

    return {
      habitId,
      from,
      to,
      counts: computeWeekdayDistribution(dates, to),
    };
  }

  private today(): DateKey {
    return toDateKey(this.clock());
  }
}
