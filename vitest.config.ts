import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'src'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
      MONGODB_URI: 'mongodb://localhost:27017/habit-tracker-test',
      JWT_SECRET: 'test-secret-test-secret-test-secret',
      RATE_LIMIT_MAX_REQUESTS: '10000',
    },
  },
});
