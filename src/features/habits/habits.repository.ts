import { FilterQuery, HydratedDocument, isValidObjectId } from 'mongoose';
import { CreateHabitInput, Habit, HabitFilter, UpdateHabitInput } from '@/shared/types';
import { HabitModel, IHabit } from './habits.model';

export interface HabitsRepository {
  create(ownerId: string, input: CreateHabitInput): Promise<Habit>;
  findOwned(ownerId: string, habitId: string): Promise<Habit | null>;
  /** Oldest first. */
  listByOwner(ownerId: string, filter?: HabitFilter): Promise<Habit[]>;
  update(ownerId: string, habitId: string, changes: UpdateHabitInput): Promise<Habit | null>;
  delete(ownerId: string, habitId: string): Promise<boolean>;
}

function toHabit(doc: HydratedDocument<IHabit>): Habit {
  return {
    id: doc._id.toString(),
    ownerId: doc.ownerId.toString(),
    name: doc.name,
    description: doc.description ?? null,
    frequency: doc.frequency,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt ?? null,
  };
}

export class MongoHabitsRepository implements HabitsRepository {
  async create(ownerId: string, input: CreateHabitInput): Promise<Habit> {
    const habit = await HabitModel.create({
      ownerId,
      name: input.name,
      description: input.description ?? null,
      frequency: input.frequency,
    });
    return toHabit(habit);
  }

  async findOwned(ownerId: string, habitId: string): Promise<Habit | null> {
    if (!isValidObjectId(habitId) || !isValidObjectId(ownerId)) return null;
    const habit = await HabitModel.findOne({ _id: habitId, ownerId });
    return habit ? toHabit(habit) : null;
  }

  async listByOwner(ownerId: string, filter: HabitFilter = {}): Promise<Habit[]> {
    if (!isValidObjectId(ownerId)) return [];
    const where: FilterQuery<IHabit> = { ownerId };
    if (filter.frequency) where.frequency = filter.frequency;

    const habits = await HabitModel.find(where).sort({ createdAt: 1, _id: 1 });
    return habits.map(toHabit);
  }

  async update(ownerId: string, habitId: string, changes: UpdateHabitInput): Promise<Habit | null> {
    if (!isValidObjectId(habitId) || !isValidObjectId(ownerId)) return null;
    const habit = await HabitModel.findOneAndUpdate(
      { _id: habitId, ownerId },
      { $set: changes },
      { new: true, runValidators: true }
    );
    return habit ? toHabit(habit) : null;
  }

  async delete(ownerId: string, habitId: string): Promise<boolean> {
    if (!isValidObjectId(habitId) || !isValidObjectId(ownerId)) return false;
    const res = await HabitModel.deleteOne({ _id: habitId, ownerId });
    return res.deletedCount > 0;
  }
}
