import { UserIdentity } from '../models';
import { Queryable } from './types';

export interface UserRepository {
  findIdentity(userId: number): Promise<UserIdentity | null>;
}

export const createUserRepository = (db: Queryable): UserRepository => ({
  async findIdentity(userId) {
    const result = await db.query<UserIdentity>(
      `SELECT u.id, u.username, u.role, u.is_active, d.id AS driver_id
       FROM users u
       LEFT JOIN drivers d ON d.user_id = u.id
       WHERE u.id = $1`,
      [userId]
    );
    return result.rows[0] ?? null;
  },
});
