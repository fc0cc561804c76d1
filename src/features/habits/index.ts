export { habitsRoutes } from './habits.routes';
export type { HabitsRoutesOptions } from './habits.routes';
export { HabitsService } from './habits.service';
export type { HabitWithStats, HabitToday } from './habits.service';
export { MongoHabitsRepository } from './habits.repository';
export type { HabitsRepository } from './habits.repository';
