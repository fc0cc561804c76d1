import { FastifyInstance } from 'fastify';
import { CompletionsController } from './completions.controller';
import { CompletionsService } from './completions.service';

export interface CompletionsRoutesOptions {
  completionsService: CompletionsService;
}

export async function completionsRoutes(fastify: FastifyInstance, options: CompletionsRoutesOptions) {
  const completionsController = new CompletionsController(options.completionsService);

  fastify.addHook('preHandler', async (request, reply) => {
    await fastify.verifyJWT(request, reply);
  });

  fastify.post(
    '/completions',
    {
      schema: {
        tags: ['Completions'],
        summary: 'Record a completion',
        description: 'Mark a habit as done for a calendar date (today when omitted); one completion per habit per date',
        security: [{ bearerAuth: [] }],
      },
    },
    completionsController.createCompletion
  );

  fastify.delete(
    '/completions/:completionId',
    {
      schema: {
        tags: ['Completions'],
        summary: 'Delete a completion',
        security: [{ bearerAuth: [] }],
      },
    },
    completionsController.deleteCompletion
  );

  fastify.get(
    '/habits/:habitId/completions',
    {
      schema: {
        tags: ['Completions'],
        summary: 'List completions of a habit',
        description: 'Newest first, optionally bounded by from/to calendar dates (inclusive)',
        security: [{ bearerAuth: [] }],
      },
    },
    completionsController.getHabitCompletions
  );
}
