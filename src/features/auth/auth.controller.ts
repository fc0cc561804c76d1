import { FastifyRequest, FastifyReply } from 'fastify';
import { success } from '@/utils/response';
import { requireUser } from '@/utils/auth';

export class AuthController {
  me = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);

    return success(reply, user, 'User profile retrieved');
  };
}
