import fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { config } from '@/config/env';
import { registerPlugins } from '@/config/plugins';
import { AnalyticsSettings } from '@/shared/types';
import { createVerifyJWT } from '@/utils/auth';
import { Clock, systemClock } from '@/utils/dates';
import { errorHandler } from '@/utils/errors';
import { loggerOptions } from '@/utils/logger';
import { authRoutes, UsersRepository } from '@/features/auth';
import { habitsRoutes, HabitsRepository, HabitsService } from '@/features/habits';
import {
  completionsRoutes,
  CompletionLog,
  CompletionsRepository,
  CompletionsService,
} from '@/features/completions';
import { statsRoutes, StatsService } from '@/features/stats';

export interface AppDependencies {
  users: UsersRepository;
  habits: HabitsRepository;
  completions: CompletionsRepository;
  clock?: Clock;
  settings?: Partial<AnalyticsSettings>;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = fastify({
    logger: deps.logger ?? loggerOptions,
    trustProxy: true,
  });

  const clock = deps.clock ?? systemClock;
  const settings: AnalyticsSettings = {
    gracePeriods: config.STREAK_GRACE_PERIODS,
    overviewTopN: config.OVERVIEW_TOP_N,
    ...deps.settings,
  };

  const completionLog = new CompletionLog(deps.habits, deps.completions);
  const habitsService = new HabitsService(deps.habits, deps.completions, settings, clock);
  const completionsService = new CompletionsService(deps.habits, deps.completions, clock);
  const statsService = new StatsService(deps.habits, completionLog, settings, clock);

  await registerPlugins(app, createVerifyJWT(deps.users));
  app.setErrorHandler(errorHandler);

  app.get('/health', async () => ({ status: 'ok', timestamp: clock().toISOString() }));
  await app.register(authRoutes, { prefix: '/api/v1/auth' });
  await app.register(habitsRoutes, { prefix: '/api/v1/habits', habitsService });
  await app.register(completionsRoutes, { prefix: '/api/v1', completionsService });
  await app.register(statsRoutes, { prefix: '/api/v1/stats', statsService });

  return app;
}
