import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Habit } from '@/shared/types';
import type { HabitToday, HabitWithStats } from '@/features/habits';
import { createTestServer, TestContext } from '../setup';
import { authHeader } from '../helpers/auth';
import { completeHabit, createHabit } from '../helpers/api';
import { ErrorResponse, Serialized, SuccessResponse } from '../helpers/types';

describe('Habits Integration Tests', () => {
  let ctx: TestContext;
  let userId: string;

  beforeEach(async () => {
    ctx = await createTestServer();
    userId = ctx.users.add('alice').id;
  });

  afterEach(async () => {
    await ctx.server.close();
  });

  describe('POST /api/v1/habits', () => {
    it('creates a daily habit by default', async () => {
      const response = await ctx.server.inject({
        method: 'POST',
        url: '/api/v1/habits',
        headers: authHeader(userId),
        payload: { name: '  Read  ', description: '20 pages' },
      });

      expect(response.statusCode).toBe(201);
      const body = response.json<SuccessResponse<Serialized<Habit>>>();
      expect(body.message).toBe('Habit created successfully');
      expect(body.data).toEqual({
        id: expect.any(String),
        ownerId: userId,
        name: 'Read',
        description: '20 pages',
        frequency: 'daily',
        createdAt: '2025-03-10T09:00:00.000Z',
        updatedAt: null,
      });
    });

    it('rejects an unknown frequency', async () => {
      const response = await ctx.server.inject({
        method: 'POST',
        url: '/api/v1/habits',
        headers: authHeader(userId),
        payload: { name: 'Read', frequency: 'yearly' },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json<ErrorResponse>();
      expect(body.error).toBe('VALIDATION_ERROR');
      expect(body.details?.[0]?.path).toBe('frequency');
    });

    it('rejects a blank name', async () => {
      const response = await ctx.server.inject({
        method: 'POST',
        url: '/api/v1/habits',
        headers: authHeader(userId),
        payload: { name: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('Name is required');
    });

    it('requires authentication', async () => {
      const response = await ctx.server.inject({
        method: 'POST',
        url: '/api/v1/habits',
        payload: { name: 'Read' },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('GET /api/v1/habits', () => {
    it('lists own habits oldest first and filters by frequency', async () => {
      await createHabit(ctx.server, userId, { name: 'Read' });
      ctx.clock.set('2025-03-10T10:00:00.000Z');
      await createHabit(ctx.server, userId, { name: 'Run', frequency: 'weekly' });
      await createHabit(ctx.server, ctx.users.add('bob').id, { name: 'Swim' });

      const all = await ctx.server.inject({ method: 'GET', url: '/api/v1/habits', headers: authHeader(userId) });
      const weekly = await ctx.server.inject({
        method: 'GET',
        url: '/api/v1/habits?frequency=weekly',
        headers: authHeader(userId),
      });

      expect(all.json<SuccessResponse<Serialized<Habit>[]>>().data.map((h) => h.name)).toEqual(['Read', 'Run']);
      expect(weekly.json<SuccessResponse<Serialized<Habit>[]>>().data.map((h) => h.name)).toEqual(['Run']);
    });
  });

  describe('GET /api/v1/habits/:habitId', () => {
    it('does not reveal habits of other users', async () => {
      const habit = await createHabit(ctx.server, ctx.users.add('bob').id, { name: 'Swim' });

      const response = await ctx.server.inject({
        method: 'GET',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
      });

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorResponse>()).toEqual({
        success: false,
        error: 'NOT_FOUND',
        message: 'Habit not found',
      });
    });
  });

  describe('PUT /api/v1/habits/:habitId', () => {
    it('updates the name and stamps updatedAt', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });
      ctx.clock.set('2025-03-10T12:00:00.000Z');

      const response = await ctx.server.inject({
        method: 'PUT',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
        payload: { name: 'Read fiction' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<SuccessResponse<Serialized<Habit>>>();
      expect(body.data.name).toBe('Read fiction');
      expect(body.data.frequency).toBe('daily');
      expect(body.data.updatedAt).toBe('2025-03-10T12:00:00.000Z');
    });

    it('changes the frequency of a habit without completions', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });

      const response = await ctx.server.inject({
        method: 'PUT',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
        payload: { frequency: 'weekly' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<SuccessResponse<Serialized<Habit>>>().data.frequency).toBe('weekly');
    });

    it('refuses to change the frequency once completions exist', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });
      await completeHabit(ctx.server, userId, habit.id, '2025-03-09');

      const response = await ctx.server.inject({
        method: 'PUT',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
        payload: { frequency: 'monthly' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>()).toEqual({
        success: false,
        error: 'FREQUENCY_LOCKED',
        message: 'Frequency cannot be changed once a habit has completions',
      });
    });

    it('accepts the unchanged frequency alongside other edits once completions exist', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });
      await completeHabit(ctx.server, userId, habit.id, '2025-03-09');

      const response = await ctx.server.inject({
        method: 'PUT',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
        payload: { frequency: 'daily', description: 'Before bed' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<SuccessResponse<Serialized<Habit>>>().data.description).toBe('Before bed');
    });

    it('rejects an empty update', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });

      const response = await ctx.server.inject({
        method: 'PUT',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('At least one field must be provided');
    });
  });

  describe('DELETE /api/v1/habits/:habitId', () => {
    it('deletes the habit together with its completions', async () => {
      const habit = await createHabit(ctx.server, userId, { name: 'Read' });
      await completeHabit(ctx.server, userId, habit.id, '2025-03-08', '2025-03-09');

      const response = await ctx.server.inject({
        method: 'DELETE',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: { deletedHabitId: habit.id, deletedCompletions: 2 },
        message: "Habit 'Read' deleted successfully",
      });
      expect(await ctx.completions.countByHabits([habit.id])).toBe(0);

      const again = await ctx.server.inject({
        method: 'GET',
        url: `/api/v1/habits/${habit.id}`,
        headers: authHeader(userId),
      });
      expect(again.statusCode).toBe(404);
    });
  });

  describe('today and detailed views', () => {
    let readId: string;

    beforeEach(async () => {
      ctx.clock.set('2025-03-01T08:00:00.000Z');
      readId = (await createHabit(ctx.server, userId, { name: 'Read' })).id;
      ctx.clock.set('2025-03-10T09:00:00.000Z');
      await createHabit(ctx.server, userId, { name: 'Stretch' });

      await completeHabit(ctx.server, userId, readId, '2025-03-08', '2025-03-09');
      await ctx.server.inject({
        method: 'POST',
        url: '/api/v1/completions',
        headers: authHeader(userId),
        payload: { habitId: readId, notes: 'morning', rating: 4 },
      });
    });

    it('GET /api/v1/habits/today reports each habit as of today', async () => {
      const response = await ctx.server.inject({
        method: 'GET',
        url: '/api/v1/habits/today',
        headers: authHeader(userId),
      });

      expect(response.statusCode).toBe(200);
      const [read, stretch] = response.json<SuccessResponse<Serialized<HabitToday>[]>>().data;

      expect(read).toMatchObject({
        name: 'Read',
        completedToday: true,
        currentStreak: 3,
        completionRate: 0.3,
        completionPercentage: 30,
      });
      expect(read.completions).toEqual([
        expect.objectContaining({ completedDate: '2025-03-10', notes: 'morning', rating: 4 }),
      ]);
      expect(stretch).toMatchObject({
        name: 'Stretch',
        completedToday: false,
        currentStreak: 0,
        completionRate: 0,
        completionPercentage: 0,
        completions: [],
      });
    });

    it('GET /api/v1/habits/:habitId/detailed includes every completion and the stats', async () => {
      const response = await ctx.server.inject({
        method: 'GET',
        url: `/api/v1/habits/${readId}/detailed`,
        headers: authHeader(userId),
      });

      expect(response.statusCode).toBe(200);
      const detailed = response.json<SuccessResponse<Serialized<HabitWithStats>>>().data;
      expect(detailed.completions.map((c) => c.completedDate)).toEqual(['2025-03-08', '2025-03-09', '2025-03-10']);
      expect(detailed.currentStreak).toBe(3);
      expect(detailed.completionRate).toBe(0.3);
    });
  });
});
