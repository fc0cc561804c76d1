import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  MONGODB_URI: z.string().min(1),

  JWT_SECRET: z.string().min(32),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  RATE_LIMIT_WINDOW_MS: z.string().regex(/^\d+$/).default('60000').transform(Number),
  RATE_LIMIT_MAX_REQUESTS: z.string().regex(/^\d+$/).default('100').transform(Number),

  OVERVIEW_TOP_N: z.string().regex(/^\d+$/).default('5').transform(Number)
    .refine((n) => n >= 1, 'OVERVIEW_TOP_N must be at least 1'),
  // Missed periods tolerated before a current streak resets
  STREAK_GRACE_PERIODS: z.string().regex(/^\d+$/).default('0').transform(Number),
});

function parseEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    console.error('[ERROR] Invalid environment variables:', error);
    process.exit(1);
  }
}

export const config = parseEnv();

export type Config = typeof config;
