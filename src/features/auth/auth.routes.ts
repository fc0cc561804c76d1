import { FastifyInstance } from 'fastify';
import { AuthController } from './auth.controller';

const authController = new AuthController();

export async function authRoutes(fastify: FastifyInstance) {
  fastify.addHook('preHandler', async (request, reply) => {
    await fastify.verifyJWT(request, reply);
  });

  fastify.get(
    '/me',
    {
      schema: {
        tags: ['Authentication'],
        summary: 'Get user profile',
        description: 'Retrieve the user the bearer token belongs to',
        security: [{ bearerAuth: [] }],
      },
    },
    authController.me
  );
}
