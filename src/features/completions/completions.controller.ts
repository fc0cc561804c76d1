import { FastifyRequest, FastifyReply } from 'fastify';
import { CompletionsService } from './completions.service';
import {
  completionParamsSchema,
  createCompletionSchema,
  dateRangeQuerySchema,
  habitParamsSchema,
} from '@/shared/schemas';
import { success, created } from '@/utils/response';
import { requireUser } from '@/utils/auth';

export class CompletionsController {
  constructor(private readonly completionsService: CompletionsService) {}

  createCompletion = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const input = createCompletionSchema.parse(request.body);

    const completion = await this.completionsService.recordCompletion(user.id, input);

    return created(reply, completion, 'Completion recorded');
  };

  getHabitCompletions = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);
    const range = dateRangeQuerySchema.parse(request.query);

    const completions = await this.completionsService.listHabitCompletions(user.id, habitId, range);

    return success(reply, completions);
  };

  deleteCompletion = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { completionId } = completionParamsSchema.parse(request.params);

    await this.completionsService.deleteCompletion(user.id, completionId);

    return success(reply, { deletedCompletionId: completionId }, 'Completion record deleted successfully');
  };
}
