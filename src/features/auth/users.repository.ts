import { HydratedDocument, isValidObjectId } from 'mongoose';
import { User } from '@/shared/types';
import { IUser, UserModel } from './auth.model';

export interface UsersRepository {
  findById(userId: string): Promise<User | null>;
}

function toUser(doc: HydratedDocument<IUser>): User {
  return {
    id: doc._id.toString(),
    username: doc.username,
    email: doc.email,
    createdAt: doc.createdAt,
  };
}

export class MongoUsersRepository implements UsersRepository {
  async findById(userId: string): Promise<User | null> {
    if (!isValidObjectId(userId)) return null;
    const user = await UserModel.findById(userId);
    return user ? toUser(user) : null;
  }
}
