import type { Frequency, HabitSummary } from '@/analytics/types';
import type { DateKey } from '@/utils/dates';

// Common response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
  details?: unknown;
  stack?: string;
}

// User types
export interface AuthUser {
  id: string;
  username: string;
}

export interface User {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
}

// Habit types
export interface Habit extends HabitSummary {
  ownerId: string;
  description: string | null;
  updatedAt: Date | null;
}

export interface CreateHabitInput {
  name: string;
  description?: string | null;
  frequency: Frequency;
}

export interface UpdateHabitInput {
  name?: string;
  description?: string | null;
  frequency?: Frequency;
}

export interface HabitFilter {
  frequency?: Frequency;
}

export interface AnalyticsSettings {
  /** Missed periods a current streak survives. */
  gracePeriods: number;
  /** Length of the overview ranking when the request does not ask for one. */
  overviewTopN: number;
}

// Completion types
export interface Completion {
  id: string;
  habitId: string;
  completedDate: DateKey;
  completedAt: Date;
  notes: string | null;
  rating: number | null;
}

export interface CreateCompletionInput {
  habitId: string;
  completedDate: DateKey;
  notes: string | null;
  rating: number | null;
}
