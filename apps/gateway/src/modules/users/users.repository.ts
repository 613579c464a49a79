// src/modules/users/users.repository.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Pool } from 'pg';
import { DATABASE_POOL } from '@/modules/infra/database/database.module';
import type { Principal } from '@/modules/auth/types/principal';
import { UserSchema } from '@/modules/users/user.zod';

/** Principal plus the stored, scheme-prefixed password hash. */
export interface UserCredentials {
  principal: Principal;
  passwordHash: string;
}

/**
 * Read-only user lookup used by login. User CRUD lives elsewhere.
 * Also the DI token; UsersModule binds PgUsersRepository.
 */
export abstract class UsersRepository {
  abstract findByUsername(username: string): Promise<UserCredentials | null>;
}

@Injectable()
export class PgUsersRepository extends UsersRepository {
  private readonly logger = new Logger(PgUsersRepository.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {
    super();
  }

  async findByUsername(username: string): Promise<UserCredentials | null> {
    const sql = `
      SELECT id, username, password, role
      FROM users
      WHERE username = $1
      LIMIT 1
    `;
    const { rows } = await this.pool.query(sql, [username]);
    if (rows.length === 0) return null;

    const parsed = UserSchema.safeParse(rows[0]);
    if (!parsed.success) {
      // e.g. a role outside the closed enum: treat the account as unusable
      this.logger.warn(`users row for ${username} failed validation: ${parsed.error.message}`);
      return null;
    }
    const user = parsed.data;
    return {
      principal: { userId: user.id, username: user.username, role: user.role },
      passwordHash: user.password,
    };
  }
}
