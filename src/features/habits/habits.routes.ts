import { FastifyInstance } from 'fastify';
import { HabitsController } from './habits.controller';
import { HabitsService } from './habits.service';

export interface HabitsRoutesOptions {
  habitsService: HabitsService;
}

export async function habitsRoutes(fastify: FastifyInstance, options: HabitsRoutesOptions) {
  const habitsController = new HabitsController(options.habitsService);

  // All habit routes require authentication
  fastify.addHook('preHandler', async (request, reply) => {
    await fastify.verifyJWT(request, reply);
  });

  fastify.post(
    '/',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Create a habit',
        description: 'Create a habit with a daily, weekly or monthly frequency',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.createHabit
  );

  fastify.get(
    '/',
    {
      schema: {
        tags: ['Habits'],
        summary: 'List habits',
        description: 'List the authenticated user\'s habits, oldest first, optionally filtered by frequency',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.listHabits
  );

  fastify.get(
    '/today',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Today\'s habits',
        description: 'Every habit with today\'s completion, completion rate and current streak',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.getTodayHabits
  );

  fastify.get(
    '/:habitId',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Get a habit',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.getHabit
  );

  fastify.get(
    '/:habitId/detailed',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Get a habit with completions and stats',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.getHabitDetailed
  );

  fastify.put(
    '/:habitId',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Update a habit',
        description: 'The frequency of a habit that already has completions cannot change',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.updateHabit
  );

  fastify.delete(
    '/:habitId',
    {
      schema: {
        tags: ['Habits'],
        summary: 'Delete a habit',
        description: 'Deletes the habit and all of its completions',
        security: [{ bearerAuth: [] }],
      },
    },
    habitsController.deleteHabit
  );
}
