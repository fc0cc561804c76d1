import { FastifyInstance } from 'fastify';
import { StatsController } from './stats.controller';
import { StatsService } from './stats.service';

export interface StatsRoutesOptions {
  statsService: StatsService;
}

export async function statsRoutes(fastify: FastifyInstance, options: StatsRoutesOptions) {
  const controller = new StatsController(options.statsService);

  fastify.addHook('preHandler', async (request, reply) => {
    await fastify.verifyJWT(request, reply);
  });

  fastify.get(
    '/overview',
    {
      schema: {
        tags: ['Stats'],
        summary: 'User overview',
        description: 'Total habits, total completions and the habits with the longest current streaks',
        security: [{ bearerAuth: [] }],
      },
    },
    controller.getOverview
  );

  fastify.get(
    '/habits/:habitId',
    {
      schema: {
        tags: ['Stats'],
        summary: 'Habit statistics',
        description: 'Current streak, longest streak and completion rate as of a date (today by default)',
        security: [{ bearerAuth: [] }],
      },
    },
    controller.getHabitStats
  );

  fastify.get(
    '/habits/:habitId/weekdays',
    {
      schema: {
        tags: ['Stats'],
        summary: 'Completions by day of week',
        description: 'Counts per weekday (0 = Sunday) over the four weeks ending on the as-of date',
        security: [{ bearerAuth: [] }],
      },
    },
    controller.getWeekdayDistribution
  );
}
