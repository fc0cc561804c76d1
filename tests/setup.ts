import { FastifyInstance } from 'fastify';
import { buildApp } from '@/app';
import { AnalyticsSettings } from '@/shared/types';
import { createTestClock, TestClock } from './helpers/clock';
import {
  InMemoryCompletionsRepository,
  InMemoryHabitsRepository,
  InMemoryUsersRepository,
} from './helpers/in-memory';

export interface TestContext {
  server: FastifyInstance;
  clock: TestClock;
  users: InMemoryUsersRepository;
  habits: InMemoryHabitsRepository;
  completions: InMemoryCompletionsRepository;
}

export async function createTestServer(
  now: string = '2025-03-10T09:00:00.000Z',
  settings: Partial<AnalyticsSettings> = {}
): Promise<TestContext> {
  const clock = createTestClock(now);
  const users = new InMemoryUsersRepository();
  const habits = new InMemoryHabitsRepository(clock.now);
  const completions = new InMemoryCompletionsRepository(clock.now);

  const server = await buildApp({
    users,
    habits,
    completions,
    clock: clock.now,
    settings,
    logger: false,
  });
  await server.ready();

  return { server, clock, users, habits, completions };
}
