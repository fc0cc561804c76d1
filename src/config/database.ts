import mongoose from 'mongoose';
import { config } from './env';
import { logger } from '@/utils/logger';

type RetryOptions = {
  retries?: number;
  intervalMs?: number;
};

export async function connectDatabase(options: RetryOptions = {}) {
  const { retries = 5, intervalMs = 1000 } = options;

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      await mongoose.connect(config.MONGODB_URI, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 30000,
        connectTimeoutMS: 30000,
      });
      logger.info({ attempts: attempt + 1 }, '[Database] Connected to MongoDB');

      mongoose.connection.on('error', (err) => {
        logger.error({ err }, 'MongoDB connection error');
      });
      mongoose.connection.on('disconnected', () => {
        logger.warn('MongoDB disconnected');
      });
      return;
    } catch (error) {
      const isLastAttempt = attempt === retries;
      logger.warn({ err: error, attempt: attempt + 1 }, 'Database connection attempt failed');
      if (isLastAttempt) {
        logger.fatal({ err: error }, 'Database connection failed');
        throw error;
      }
      const delay = intervalMs * (attempt + 1);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

export async function disconnectDatabase() {
  await mongoose.disconnect();
  logger.info('Disconnected from MongoDB');
}
