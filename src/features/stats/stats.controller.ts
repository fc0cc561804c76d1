import { FastifyRequest, FastifyReply } from 'fastify';
import { StatsService } from './stats.service';
import { asOfQuerySchema, habitParamsSchema, overviewQuerySchema } from '@/shared/schemas';
import { success } from '@/utils/response';
import { requireUser } from '@/utils/auth';

export class StatsController {
  constructor(private readonly statsService: StatsService) {}

  getOverview = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { asOf, limit } = overviewQuerySchema.parse(request.query);

    const overview = await this.statsService.getOverview(user.id, asOf, limit);

    return success(reply, overview);
  };

  getHabitStats = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);
    const { asOf } = asOfQuerySchema.parse(request.query);

    const stats = await this.statsService.getHabitStats(user.id, habitId, asOf);

    return success(reply, stats);
  };

  getWeekdayDistribution = async (request: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(request);
    const { habitId } = habitParamsSchema.parse(request.params);
    const { asOf } = asOfQuerySchema.parse(request.query);

    const distribution = await this.statsService.getWeekdayDistribution(user.id, habitId, asOf);

    return success(reply, distribution);
  };
}
