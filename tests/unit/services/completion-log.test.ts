import { beforeEach, describe, expect, it } from 'vitest';
import { CompletionLog } from '@/features/completions/completion-log';
import { NotFoundError } from '@/shared/errors';
import { createTestClock } from '../../helpers/clock';
import { InMemoryCompletionsRepository, InMemoryHabitsRepository } from '../../helpers/in-memory';

describe('CompletionLog', () => {
  let habits: InMemoryHabitsRepository;
  let completions: InMemoryCompletionsRepository;
  let log: CompletionLog;
  const clock = createTestClock('2025-03-01T10:00:00.000Z');

  beforeEach(() => {
    clock.set('2025-03-01T10:00:00.000Z');
    habits = new InMemoryHabitsRepository(clock.now);
    completions = new InMemoryCompletionsRepository(clock.now);
    log = new CompletionLog(habits, completions);
  });

  async function record(habitId: string, ...dates: string[]) {
    for (const completedDate of dates) {
      await completions.create({ habitId, completedDate, notes: null, rating: null });
    }
  }

  it('returns completion dates in ascending order', async () => {
    const habit = await habits.create('owner-1', { name: 'Read', frequency: 'daily' });
    await record(habit.id, '2025-03-05', '2025-03-02', '2025-03-03');

    await expect(log.listCompletionDates('owner-1', habit.id)).resolves.toEqual([
      '2025-03-02',
      '2025-03-03',
      '2025-03-05',
    ]);
  });

  it('applies an inclusive date range', async () => {
    const habit = await habits.create('owner-1', { name: 'Read', frequency: 'daily' });
    await record(habit.id, '2025-03-01', '2025-03-02', '2025-03-03', '2025-03-04');

    await expect(
      log.listCompletionDates('owner-1', habit.id, { from: '2025-03-02', to: '2025-03-03' })
    ).resolves.toEqual(['2025-03-02', '2025-03-03']);
  });

  it('returns an empty list for a habit without completions', async () => {
    const habit = await habits.create('owner-1', { name: 'Read', frequency: 'daily' });

    await expect(log.listCompletionDates('owner-1', habit.id)).resolves.toEqual([]);
  });

  it('fails with NotFound for a habit of another owner', async () => {
    const habit = await habits.create('owner-1', { name: 'Read', frequency: 'daily' });

    await expect(log.listCompletionDates('owner-2', habit.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails with NotFound for an unknown habit', async () => {
    await expect(log.listCompletionDates('owner-1', 'missing')).rejects.toThrow('Habit not found');
  });

  it('lists every habit of a user, oldest first, with its dates', async () => {
    const run = await habits.create('owner-1', { name: 'Run', frequency: 'weekly' });
    clock.set('2025-03-02T10:00:00.000Z');
    const read = await habits.create('owner-1', { name: 'Read', frequency: 'daily' });
    await habits.create('owner-2', { name: 'Swim', frequency: 'daily' });
    await record(read.id, '2025-03-03', '2025-03-02');
    await record(run.id, '2025-03-04');

    const logs = await log.listUserCompletionLogs('owner-1');

    expect(logs.map(({ habit, completionDates }) => [habit.name, completionDates])).toEqual([
      ['Run', ['2025-03-04']],
      ['Read', ['2025-03-02', '2025-03-03']],
    ]);
  });
});
