import { FastifyRequest, FastifyReply } from 'fastify';
import { HabitsService } from './habits.service';
import { createHabitSchema, habitParamsSchema, habitQuerySchema, updateHabitSchema } from '@/shared/schemas';
import { success, created } from '@/utils/response';
import { requireUser } from '@/utils/auth';

export class HabitsController {
  constructor(private readonly habitsService: HabitsService) {}

  createHabit = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const input = createHabitSchema.parse(request.body);

    const habit = await this.habitsService.createHabit(user.id, input);

    return created(reply, habit, 'Habit created successfully');
  };

  listHabits = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const filter = habitQuerySchema.parse(request.query);

    const habits = await this.habitsService.listHabits(user.id, filter);

    return success(reply, habits);
  };

  getTodayHabits = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);

    const habits = await this.habitsService.getTodayHabits(user.id);

    return success(reply, habits);
  };

  getHabit = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);

    const habit = await this.habitsService.getHabit(user.id, habitId);

    return success(reply, habit);
  };

  getHabitDetailed = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);

    const habit = await this.habitsService.getHabitDetailed(user.id, habitId);

    return success(reply, habit);
  };

  updateHabit = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);
    const changes = updateHabitSchema.parse(request.body);

    const habit = await this.habitsService.updateHabit(user.id, habitId, changes);

    return success(reply, habit, 'Habit updated successfully');
  };

  deleteHabit = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);

    const { habit, deletedCompletions } = await this.habitsService.deleteHabit(user.id, habitId);

    return success(
      reply,
      { deletedHabitId: habit.id, deletedCompletions },
      `Habit '${habit.name}' deleted successfully`
    );
  };
}
