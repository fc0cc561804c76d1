import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { config } from '@/config/env';
import { AppError } from '@/shared/errors';
import { ApiResponse } from '@/shared/types';

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  const isDevelopment = config.NODE_ENV === 'development';
  const stack = isDevelopment ? { stack: error.stack } : {};

  const statusCode =
    error instanceof AppError ? error.statusCode
      : error instanceof ZodError || error.validation ? 400
        : error.statusCode ?? 500;
  const context = {
    error: error.message,
    method: request.method,
    url: request.url,
    ip: request.ip,
    userId: request.user?.id,
  };

  // 4xx at warn, 5xx at error with the stack
  if (statusCode >= 500) {
    request.log.error({ ...context, stack: error.stack }, 'Request failed');
  } else {
    request.log.warn(context, 'Request rejected');
  }

  // Handle known application errors
  if (error instanceof AppError) {
    const body: ApiResponse = {
      success: false,
      error: error.code,
      message: error.message,
      ...stack,
    };
    return reply.status(error.statusCode).send(body);
  }

  // Handle schema validation errors
  if (error instanceof ZodError) {
    const body: ApiResponse = {
      success: false,
      error: 'VALIDATION_ERROR',
      message: error.issues[0]?.message ?? 'Invalid request parameters',
      details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    };
    return reply.status(400).send(body);
  }

  if (error.validation) {
    const body: ApiResponse = {
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Invalid request parameters',
      details: error.validation,
    };
    return reply.status(400).send(body);
  }

  // Handle fastify errors
  if (error.statusCode) {
    const body: ApiResponse = {
      success: false,
      error: error.code ?? 'FASTIFY_ERROR',
      message: error.message,
      ...stack,
    };
    return reply.status(error.statusCode).send(body);
  }

  // Default error response
  const body: ApiResponse = {
    success: false,
    error: 'INTERNAL_ERROR',
    message: isDevelopment ? error.message : 'Internal server error',
    ...stack,
  };
  return reply.status(500).send(body);
}
