import { FastifyInstance } from 'fastify';
import type { Completion, Habit } from '@/shared/types';
import { authHeader } from './auth';
import type { Serialized, SuccessResponse } from './types';

export async function createHabit(
  server: FastifyInstance,
  userId: string,
  payload: Record<string, unknown>
): Promise<Serialized<Habit>> {
  const response = await server.inject({
    method: 'POST',
    url: '/api/v1/habits',
    headers: authHeader(userId),
    payload,
  });
  if (response.statusCode !== 201) {
    throw new Error(`Habit creation failed with ${response.statusCode}: ${response.body}`);
  }
  return response.json<SuccessResponse<Serialized<Habit>>>().data;
}

export async function completeHabit(
  server: FastifyInstance,
  userId: string,
  habitId: string,
  ...dates: string[]
): Promise<Serialized<Completion>[]> {
  const created: Serialized<Completion>[] = [];
  for (const completedDate of dates) {
    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/completions',
      headers: authHeader(userId),
      payload: { habitId, completedDate },
    });
    if (response.statusCode !== 201) {
      throw new Error(`Completion failed with ${response.statusCode}: ${response.body}`);
    }
    created.push(response.json<SuccessResponse<Serialized<Completion>>>().data);
  }
  return created;
}
