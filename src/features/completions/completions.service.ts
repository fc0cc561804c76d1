import { DateRange } from '@/analytics/types';
import { NotFoundError } from '@/shared/errors';
import { Completion } from '@/shared/types';
import { Clock, DateKey, toDateKey } from '@/utils/dates';
import { logger } from '@/utils/logger';
import { HabitsRepository } from '@/features/habits/habits.repository';
import { CompletionsRepository, duplicateCompletionError } from './completions.repository';

export interface RecordCompletionInput {
  habitId: string;
  completedDate?: DateKey;
  notes?: string | null;
  rating?: number | null;
}

export class CompletionsService {
  constructor(
    private readonly habits: HabitsRepository,
    private readonly completions: CompletionsRepository,
    private readonly clock: Clock
  ) {}

  async recordCompletion(ownerId: string, input: RecordCompletionInput): Promise<Completion> {
    const habit = await this.habits.findOwned(ownerId, input.habitId);

    if (!habit) {
      throw new NotFoundError('Habit');
    }

    const completedDate = input.completedDate ?? toDateKey(this.clock());

    const existing = await this.completions.findByHabitAndDate(habit.id, completedDate);
    if (existing) {
      throw duplicateCompletionError(completedDate);
    }

    const completion = await this.completions.create({
      habitId: habit.id,
      completedDate,
      notes: input.notes ?? null,
      rating: input.rating ?? null,
    });

    logger.info({ completionId: completion.id, habitId: habit.id, completedDate }, 'Completion recorded');

    return completion;
  }

  /** Newest first. */
  async listHabitCompletions(ownerId: string, habitId: string, range?: DateRange): Promise<Completion[]> {
    const habit = await this.habits.findOwned(ownerId, habitId);

    if (!habit) {
      throw new NotFoundError('Habit');
    }

    return this.completions.listByHabit(habit.id, range, 'desc');
  }

  async deleteCompletion(ownerId: string, completionId: string): Promise<void> {
    const completion = await this.completions.findById(completionId);
    // completions of another user's habit are reported as missing
    const habit = completion ? await this.habits.findOwned(ownerId, completion.habitId) : null;

    if (!completion || !habit) {
      throw new NotFoundError('Completion record');
    }

    await this.completions.delete(completion.id);

    logger.info({ completionId: completion.id, habitId: habit.id }, 'Completion deleted');
  }
}
