import { FastifyReply } from 'fastify';
import { ApiResponse } from '@/shared/types';

export function success<T>(reply: FastifyReply, data: T, message?: string) {
  const body: ApiResponse<T> = { success: true, data, message };
  return reply.status(200).send(body);
}

export function created<T>(reply: FastifyReply, data: T, message?: string) {
  const body: ApiResponse<T> = { success: true, data, message };
  return reply.status(201).send(body);
}
