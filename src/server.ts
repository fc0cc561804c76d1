import { FastifyInstance } from 'fastify';
import { buildApp } from '@/app';
import { config } from '@/config/env';
import { connectDatabase, disconnectDatabase } from '@/config/database';
import { logger } from '@/utils/logger';
import { MongoUsersRepository } from '@/features/auth';
import { MongoHabitsRepository } from '@/features/habits';
import { MongoCompletionsRepository } from '@/features/completions';

async function bootstrap(): Promise<FastifyInstance> {
  await connectDatabase();

  const app = await buildApp({
    users: new MongoUsersRepository(),
    habits: new MongoHabitsRepository(),
    completions: new MongoCompletionsRepository(),
  });

  const port = Number(config.PORT);
  await app.listen({ port, host: '0.0.0.0' });

  logger.info(`Habit tracker API running on port ${port}`);
  logger.info(`>> API documentation available at http://localhost:${port}/docs`);

  return app;
}

function registerShutdown(app: FastifyInstance) {
  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
      await app.close();
      await disconnectDatabase();
      process.exit(0);
    } catch (error: unknown) {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.once('SIGTERM', (signal) => void shutdown(signal));
  process.once('SIGINT', (signal) => void shutdown(signal));
}

bootstrap()
  .then(registerShutdown)
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Bootstrap failed');
    process.exit(1);
  });
