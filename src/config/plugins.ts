import { FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUi from '@fastify/swagger-ui';
import { config } from './env';
import { AppError } from '@/shared/errors';
import { VerifyJWT } from '@/utils/auth';

export async function registerPlugins(app: FastifyInstance, verifyJWT: VerifyJWT) {
  // CORS
  await app.register(fastifyCors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
  });

  // Security headers
  await app.register(fastifyHelmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  // Rate limiting
  await app.register(fastifyRateLimit, {
    max: config.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    skipOnError: true,
    keyGenerator: (request) => request.ip,
    errorResponseBuilder: (_request, context) =>
      new AppError(`Rate limit exceeded, retry in ${context.after}`, 429, 'RATE_LIMIT_EXCEEDED'),
  });

  // API documentation
  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: 'Habit Tracker API',
        description: 'Habits, completions, streaks and completion rates',
        version: '1.0.0',
      },
      servers: [
        { url: `http://localhost:${config.PORT}`, description: 'Development' },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
    },
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      displayRequestDuration: true,
    },
  });

  // Auth decorator for route hooks
  if (!app.hasDecorator('verifyJWT')) {
    app.decorate('verifyJWT', verifyJWT);
  }

  // Request logging
  app.addHook('onResponse', async (request, reply) => {
    request.log.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration: Math.round(reply.elapsedTime),
      ip: request.ip,
      userId: request.user?.id,
    }, 'Request completed');
  });
}
