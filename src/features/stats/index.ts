export { statsRoutes } from './stats.routes';
export type { StatsRoutesOptions } from './stats.routes';
export { StatsService } from './stats.service';
export type { HabitStats, OverviewStats, WeekdayStats } from './stats.service';
