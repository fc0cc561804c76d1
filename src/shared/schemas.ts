import { z } from 'zod';
import { FREQUENCIES } from '@/analytics/types';
import { isDateKey } from '@/utils/dates';

export const dateKeySchema = z
  .string()
  .refine(isDateKey, 'Expected a calendar date in YYYY-MM-DD form');

export const frequencySchema = z.enum(FREQUENCIES);

// Params
export const habitParamsSchema = z.object({
  habitId: z.string().min(1, 'Habit ID is required'),
});

export const completionParamsSchema = z.object({
  completionId: z.string().min(1, 'Completion ID is required'),
});

// Habit schemas
export const createHabitSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  description: z.string().trim().max(2000).nullish(),
  frequency: frequencySchema.default('daily'),
});

export const updateHabitSchema = z
  .object({
    name: z.string().trim().min(1, 'Name cannot be empty').max(100).optional(),
    description: z.string().trim().max(2000).nullish(),
    frequency: frequencySchema.optional(),
  })
  .refine(
    (val) => val.name !== undefined || val.description !== undefined || val.frequency !== undefined,
    'At least one field must be provided'
  );

export const habitQuerySchema = z.object({
  frequency: frequencySchema.optional(),
});

// Completion schemas
export const createCompletionSchema = z.object({
  habitId: z.string().min(1, 'Habit ID is required'),
  completedDate: dateKeySchema.optional(),
  notes: z.string().trim().max(1000).nullish(),
  rating: z.number().int().min(1, 'Rating must be between 1 and 5').max(5, 'Rating must be between 1 and 5').nullish(),
});

export const dateRangeQuerySchema = z
  .object({
    from: dateKeySchema.optional(),
    to: dateKeySchema.optional(),
  })
  .refine((val) => !val.from || !val.to || val.from <= val.to, 'from must not be after to');

// Stats schemas
export const asOfQuerySchema = z.object({
  asOf: dateKeySchema.optional(),
});

export const overviewQuerySchema = z.object({
  asOf: dateKeySchema.optional(),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});

// Token payload
export const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number().optional(),
});
