import pino, { LoggerOptions } from 'pino';
import { config } from '@/config/env';

const isDevelopment = config.NODE_ENV === 'development';

// Shared by the standalone logger and Fastify's request logger
export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  base: { service: 'habit-tracker' },
  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname,service',
    },
  } : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = pino(loggerOptions);

export default logger;
