import { computeCompletionRate, computeStreak, toPercentage } from '@/analytics';
import { InvalidStateError, NotFoundError } from '@/shared/errors';
import {
  AnalyticsSettings,
  Completion,
  CreateHabitInput,
  Habit,
  HabitFilter,
  UpdateHabitInput,
} from '@/shared/types';
import { Clock, toDateKey } from '@/utils/dates';
import { logger } from '@/utils/logger';
import { CompletionsRepository } from '@/features/completions/completions.repository';
import { HabitsRepository } from './habits.repository';

export interface HabitWithStats extends Habit {
  completions: Completion[];
  completionRate: number;
  completionPercentage: number;
  currentStreak: number;
}

export interface HabitToday extends HabitWithStats {
  completedToday: boolean;
}

export class HabitsService {
  constructor(
    private readonly habits: HabitsRepository,
    private readonly completions: CompletionsRepository,
    private readonly settings: AnalyticsSettings,
    private readonly clock: Clock
  ) {}

  async createHabit(ownerId: string, input: CreateHabitInput): Promise<Habit> {
    const habit = await this.habits.create(ownerId, input);

    logger.info({ habitId: habit.id, ownerId, frequency: habit.frequency }, 'Habit created');

    return habit;
  }

  async listHabits(ownerId: string, filter: HabitFilter = {}): Promise<Habit[]> {
    return this.habits.listByOwner(ownerId, filter);
  }

  async getHabit(ownerId: string, habitId: string): Promise<Habit> {
    const habit = await this.habits.findOwned(ownerId, habitId);

    if (!habit) {
      throw new NotFoundError('Habit');
    }

    return habit;
  }

  async updateHabit(ownerId: string, habitId: string, changes: UpdateHabitInput): Promise<Habit> {
    const habit = await this.getHabit(ownerId, habitId);

    if (changes.frequency && changes.frequency !== habit.frequency) {
      const completionCount = await this.completions.countByHabits([habit.id]);
      if (completionCount > 0) {
        throw new InvalidStateError(
          'Frequency cannot be changed once a habit has completions',
          'FREQUENCY_LOCKED'
        );
      }
    }

    const updated = await this.habits.update(ownerId, habit.id, changes);

    if (!updated) {
      throw new NotFoundError('Habit');
    }

    return updated;
  }

  async deleteHabit(ownerId: string, habitId: string) {
    const habit = await this.getHabit(ownerId, habitId);

    const deletedCompletions = await this.completions.deleteByHabit(habit.id);
    await this.habits.delete(ownerId, habit.id);

    logger.info({ habitId: habit.id, ownerId, deletedCompletions }, 'Habit deleted');

    return { habit, deletedCompletions };
  }

  /** Every habit with today's completion, if any, and its stats as of today. */
  async getTodayHabits(ownerId: string): Promise<HabitToday[]> {
    const today = toDateKey(this.clock());
    const habits = await this.habits.listByOwner(ownerId);
    const datesByHabit = await this.completions.listDatesByHabits(habits.map((habit) => habit.id));

    return Promise.all(
      habits.map(async (habit) => {
        const dates = datesByHabit.get(habit.id) ?? [];
        const todayCompletion = dates.includes(today)
          ? await this.completions.findByHabitAndDate(habit.id, today)
          : null;

        return {
          ...habit,
          ...this.stats(habit, dates, today),
          completions: todayCompletion ? [todayCompletion] : [],
          completedToday: todayCompletion !== null,
        };
      })
    );
  }

  async getHabitDetailed(ownerId: string, habitId: string): Promise<HabitWithStats> {
    const habit = await this.getHabit(ownerId, habitId);
    const completions = await this.completions.listByHabit(habit.id, undefined, 'asc');
    const today = toDateKey(this.clock());

    return {
      ...habit,
      ...this.stats(habit, completions.map((completion) => completion.completedDate), today),
      completions,
    };
  }

  private stats(habit: Habit, dates: string[], today: string) {
    const completionRate = computeCompletionRate(habit.createdAt, habit.frequency, dates, today);
    const { currentStreak } = computeStreak(habit.id, habit.frequency, dates, today, {
      gracePeriods: this.settings.gracePeriods,
    });

    return {
      completionRate,
      completionPercentage: toPercentage(completionRate),
      currentStreak,
    };
  }
}
