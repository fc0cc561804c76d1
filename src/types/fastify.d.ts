import type { VerifyJWT } from '@/utils/auth';

declare module 'fastify' {
  interface FastifyInstance {
    verifyJWT: VerifyJWT;
  }
}
