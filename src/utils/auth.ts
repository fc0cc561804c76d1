import { FastifyRequest, FastifyReply } from 'fastify';
import jwt from 'jsonwebtoken';
import { config } from '@/config/env';
import { AuthenticationError } from '@/shared/errors';
import { jwtPayloadSchema } from '@/shared/schemas';
import { AuthUser } from '@/shared/types';
import { UsersRepository } from '@/features/auth/users.repository';

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthUser;
  }
}

export type VerifyJWT = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/** Token-to-user id; tokens are issued by the identity service. */
export function decodeToken(token: string, secret: string = config.JWT_SECRET): string {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    throw new AuthenticationError('Invalid or expired token');
  }

  const payload = jwtPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new AuthenticationError('Malformed token payload');
  }
  return payload.data.userId;
}

export function createVerifyJWT(users: UsersRepository): VerifyJWT {
  return async function verifyJWT(request: FastifyRequest, _reply: FastifyReply) {
    const authHeader = request.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
      throw new AuthenticationError('Missing or invalid authorization header');
    }

    const token = authHeader.slice('Bearer '.length).trim();

    if (!token) {
      throw new AuthenticationError('Missing token');
    }

    const userId = decodeToken(token);

    // Verify user exists in database
    const user = await users.findById(userId);

    if (!user) {
      throw new AuthenticationError('User no longer exists');
    }

    request.user = { id: user.id, username: user.username };
  };
}

export function requireUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw new AuthenticationError('User not authenticated');
  }
  return request.user;
}
