export { authRoutes } from './auth.routes';
export { MongoUsersRepository } from './users.repository';
export type { UsersRepository } from './users.repository';
