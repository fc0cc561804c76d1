import { CompletionLogAccessor, DateRange, HabitCompletionLog } from '@/analytics/types';
import { NotFoundError } from '@/shared/errors';
import { Habit } from '@/shared/types';
import { DateKey } from '@/utils/dates';
import { HabitsRepository } from '@/features/habits/habits.repository';
import { CompletionsRepository } from './completions.repository';

/** Completion Log Accessor over the habit and completion repositories. */
export class CompletionLog implements CompletionLogAccessor<Habit> {
  constructor(
    private readonly habits: HabitsRepository,
    private readonly completions: CompletionsRepository
  ) {}

  async listCompletionDates(ownerId: string, habitId: string, range?: DateRange): Promise<DateKey[]> {
    const habit = await this.habits.findOwned(ownerId, habitId);
    if (!habit) {
      throw new NotFoundError('Habit');
    }

    const completions = await this.completions.listByHabit(habit.id, range, 'asc');
    return completions.map((completion) => completion.completedDate);
  }

  async listUserCompletionLogs(ownerId: string): Promise<HabitCompletionLog<Habit>[]> {
    const habits = await this.habits.listByOwner(ownerId);
    const datesByHabit = await this.completions.listDatesByHabits(habits.map((habit) => habit.id));

    return habits.map((habit) => ({
      habit,
      completionDates: datesByHabit.get(habit.id) ?? [],
    }));
  }
}
