/**
 * PgSessionStore
 * - SessionStore over the `jwt_authentications` table (raw SQL on the pg Pool).
 * - One row per issued pair; rows are inserted and deleted, never updated.
 * - Rotation runs delete-old + insert-new in a single transaction.
 */
// src/modules/sessions/pg-session.store.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Pool, type QueryConfig } from 'pg';
import { DATABASE_POOL } from '@/modules/infra/database/database.module';
import { AuthenticationNotFoundError } from '@/modules/auth/auth.errors';
import type { NewSessionRecord, SessionRecord } from '@/modules/auth/types/session-record';
import { type EncodedToken, TokenUse } from '@/modules/auth/types/token-claims';
import { SessionStore } from './session.store';
import { SESSION_COLUMNS, type SessionRow, SessionRowSchema } from './session.zod';

function toRecord(raw: unknown): SessionRecord {
  const row: SessionRow = SessionRowSchema.parse(raw);
  return {
    sessionId: row.id,
    userId: row.user_id,
    accessToken: {
      token: row.access_token,
      claims: {
        subject: row.access_token_subject,
        tokenUse: TokenUse.ACCESS,
        role: row.access_token_role,
        issuedAt: row.access_token_issued_at,
        expiration: row.access_token_expiration,
      },
    },
    refreshToken: {
      token: row.refresh_token,
      claims: {
        subject: row.refresh_token_subject,
        tokenUse: TokenUse.REFRESH,
        role: row.refresh_token_role,
        issuedAt: row.refresh_token_issued_at,
        expiration: row.refresh_token_expiration,
      },
    },
  };
}

function insertSession(record: NewSessionRecord): QueryConfig {
  const { accessToken: at, refreshToken: rt } = record;
  return {
    text: `
      INSERT INTO jwt_authentications (
        user_id,
        access_token, access_token_subject, access_token_role, access_token_issued_at, access_token_expiration,
        refresh_token, refresh_token_subject, refresh_token_role, refresh_token_issued_at, refresh_token_expiration
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      RETURNING ${SESSION_COLUMNS}
    `,
    values: [
      record.userId,
      at.token,
      at.claims.subject,
      at.claims.role,
      at.claims.issuedAt,
      at.claims.expiration,
      rt.token,
      rt.claims.subject,
      rt.claims.role,
      rt.claims.issuedAt,
      rt.claims.expiration,
    ],
  };
}

function deleteByRefreshTokenQuery(token: EncodedToken): QueryConfig {
  return {
    text: `DELETE FROM jwt_authentications WHERE refresh_token = $1 RETURNING ${SESSION_COLUMNS}`,
    values: [token],
  };
}

function firstRecord(rows: unknown[]): SessionRecord {
  if (rows.length === 0) {
    throw new Error('save: INSERT returned no row');
  }
  return toRecord(rows[0]);
}

@Injectable()
export class PgSessionStore extends SessionStore {
  private readonly logger = new Logger(PgSessionStore.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {
    super();
  }

  async save(record: NewSessionRecord): Promise<SessionRecord> {
    const { rows } = await this.pool.query<SessionRow>(insertSession(record));
    return firstRecord(rows);
  }

  async accessTokenExists(token: EncodedToken): Promise<boolean> {
    const { rows } = await this.pool.query(
      'SELECT 1 FROM jwt_authentications WHERE access_token = $1 LIMIT 1',
      [token],
    );
    return rows.length > 0;
  }

  async refreshTokenExists(token: EncodedToken): Promise<boolean> {
    const { rows } = await this.pool.query(
      'SELECT 1 FROM jwt_authentications WHERE refresh_token = $1 LIMIT 1',
      [token],
    );
    return rows.length > 0;
  }

  async findByAccessToken(token: EncodedToken): Promise<SessionRecord | null> {
    const { rows } = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM jwt_authentications WHERE access_token = $1 LIMIT 1`,
      [token],
    );
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async findByRefreshToken(token: EncodedToken): Promise<SessionRecord | null> {
    const { rows } = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM jwt_authentications WHERE refresh_token = $1 LIMIT 1`,
      [token],
    );
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async findAll(): Promise<SessionRecord[]> {
    const { rows } = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM jwt_authentications ORDER BY access_token_issued_at, id`,
    );
    return rows.map(toRecord);
  }

  async findAllByUserId(userId: string): Promise<SessionRecord[]> {
    const { rows } = await this.pool.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM jwt_authentications WHERE user_id = $1
       ORDER BY access_token_issued_at, id`,
      [userId],
    );
    return rows.map(toRecord);
  }

  async deleteByAccessToken(token: EncodedToken): Promise<SessionRecord | null> {
    const { rows } = await this.pool.query<SessionRow>(
      `DELETE FROM jwt_authentications WHERE access_token = $1 RETURNING ${SESSION_COLUMNS}`,
      [token],
    );
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async deleteByRefreshToken(token: EncodedToken): Promise<SessionRecord | null> {
    const { rows } = await this.pool.query<SessionRow>(deleteByRefreshTokenQuery(token));
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async deleteAllByUserId(userId: string): Promise<SessionRecord[]> {
    const { rows } = await this.pool.query<SessionRow>(
      `DELETE FROM jwt_authentications WHERE user_id = $1 RETURNING ${SESSION_COLUMNS}`,
      [userId],
    );
    return rows.map(toRecord);
  }

  async deleteAllExpiredByRefreshTokenExpiration(now: Date): Promise<number> {
    const { rowCount } = await this.pool.query(
      'DELETE FROM jwt_authentications WHERE refresh_token_expiration < $1',
      [now],
    );
    return rowCount ?? 0;
  }

  /**
   * Transactional rotation: the old row is deleted first (row lock) so two
   * concurrent refreshes with the same token cannot both succeed.
   */
  override async rotate(
    oldRefreshToken: EncodedToken,
    replacement: NewSessionRecord,
  ): Promise<SessionRecord> {
    const client = await this.pool.connect();
    // set when ROLLBACK fails; the pool then discards the connection
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');

      const removed = await client.query<SessionRow>(deleteByRefreshTokenQuery(oldRefreshToken));
      if (removed.rows.length === 0) {
        await client.query('ROLLBACK');
        throw new AuthenticationNotFoundError('Session was already rotated or revoked');
      }
      const { rows } = await client.query<SessionRow>(insertSession(replacement));
      const saved = firstRecord(rows);

      await client.query('COMMIT');
      return saved;
    } catch (error) {
      if (!(error instanceof AuthenticationNotFoundError)) {
        this.logger.error(
          `rotate failed: ${error instanceof Error ? error.message : String(error)}`,
        );
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          broken =
            rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
          this.logger.error(`rollback failed: ${broken.message}`);
        }
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }
}
