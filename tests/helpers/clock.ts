import { Clock } from '@/utils/dates';

export interface TestClock {
  now: Clock;
  set(iso: string): void;
}

export function createTestClock(iso: string): TestClock {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set(next: string) {
      current = new Date(next);
    },
  };
}
