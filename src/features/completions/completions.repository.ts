import mongoose, { FilterQuery, HydratedDocument, isValidObjectId } from 'mongoose';
import { DateRange } from '@/analytics/types';
import { ValidationError } from '@/shared/errors';
import { Completion, CreateCompletionInput } from '@/shared/types';
import { DateKey } from '@/utils/dates';
import { CompletionModel, ICompletion } from './completions.model';

export type SortOrder = 'asc' | 'desc';

export interface CompletionsRepository {
  /** Throws ValidationError (DUPLICATE_COMPLETION) when the habit already has one on that date. */
  create(input: CreateCompletionInput): Promise<Completion>;
  findById(completionId: string): Promise<Completion | null>;
  findByHabitAndDate(habitId: string, completedDate: DateKey): Promise<Completion | null>;
  listByHabit(habitId: string, range?: DateRange, order?: SortOrder): Promise<Completion[]>;
  /** Ascending completion dates keyed by habit id; every requested id is present. */
  listDatesByHabits(habitIds: readonly string[]): Promise<Map<string, DateKey[]>>;
  countByHabits(habitIds: readonly string[]): Promise<number>;
  delete(completionId: string): Promise<boolean>;
  deleteByHabit(habitId: string): Promise<number>;
}

const DUPLICATE_KEY = 11000;

export function duplicateCompletionError(completedDate: DateKey): ValidationError {
  return new ValidationError(`Habit already completed for ${completedDate}`, 'DUPLICATE_COMPLETION');
}

function toCompletion(doc: HydratedDocument<ICompletion>): Completion {
  return {
    id: doc._id.toString(),
    habitId: doc.habitId.toString(),
    completedDate: doc.completedDate,
    completedAt: doc.completedAt,
    notes: doc.notes ?? null,
    rating: doc.rating ?? null,
  };
}

function rangeFilter(habitId: string, range: DateRange = {}): FilterQuery<ICompletion> {
  const where: FilterQuery<ICompletion> = { habitId };
  const bounds: { $gte?: DateKey; $lte?: DateKey } = {};
  if (range.from) bounds.$gte = range.from;
  if (range.to) bounds.$lte = range.to;
  if (range.from || range.to) where.completedDate = bounds;
  return where;
}

export class MongoCompletionsRepository implements CompletionsRepository {
  async create(input: CreateCompletionInput): Promise<Completion> {
    try {
      const completion = await CompletionModel.create({
        habitId: input.habitId,
        completedDate: input.completedDate,
        notes: input.notes,
        rating: input.rating,
      });
      return toCompletion(completion);
    } catch (error) {
      // a concurrent insert for the same date loses on the unique index
      if (error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY) {
        throw duplicateCompletionError(input.completedDate);
      }
      throw error;
    }
  }

  async findById(completionId: string): Promise<Completion | null> {
    if (!isValidObjectId(completionId)) return null;
    const completion = await CompletionModel.findById(completionId);
    return completion ? toCompletion(completion) : null;
  }

  async findByHabitAndDate(habitId: string, completedDate: DateKey): Promise<Completion | null> {
    if (!isValidObjectId(habitId)) return null;
    const completion = await CompletionModel.findOne({ habitId, completedDate });
    return completion ? toCompletion(completion) : null;
  }

  async listByHabit(habitId: string, range?: DateRange, order: SortOrder = 'asc'): Promise<Completion[]> {
    if (!isValidObjectId(habitId)) return [];
    const completions = await CompletionModel.find(rangeFilter(habitId, range))
      .sort({ completedDate: order === 'asc' ? 1 : -1 });
    return completions.map(toCompletion);
  }

  async listDatesByHabits(habitIds: readonly string[]): Promise<Map<string, DateKey[]>> {
    const datesByHabit = new Map<string, DateKey[]>(habitIds.map((id) => [id, []]));
    if (habitIds.length === 0) return datesByHabit;

    const completions = await CompletionModel.find({ habitId: { $in: [...habitIds] } })
      .select({ habitId: 1, completedDate: 1 })
      .sort({ completedDate: 1 });

    for (const completion of completions) {
      datesByHabit.get(completion.habitId.toString())?.push(completion.completedDate);
    }
    return datesByHabit;
  }

  async countByHabits(habitIds: readonly string[]): Promise<number> {
    if (habitIds.length === 0) return 0;
    return CompletionModel.countDocuments({ habitId: { $in: [...habitIds] } });
  }

  async delete(completionId: string): Promise<boolean> {
    if (!isValidObjectId(completionId)) return false;
    const res = await CompletionModel.deleteOne({ _id: completionId });
    return res.deletedCount > 0;
  }

  async deleteByHabit(habitId: string): Promise<number> {
    if (!isValidObjectId(habitId)) return 0;
    const res = await CompletionModel.deleteMany({ habitId });
    return res.deletedCount;
  }
}
