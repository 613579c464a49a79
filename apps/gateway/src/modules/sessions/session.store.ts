// src/modules/sessions/session.store.ts
import { AuthenticationNotFoundError } from '@/modules/auth/auth.errors';
import type { NewSessionRecord, SessionRecord } from '@/modules/auth/types/session-record';
import type { EncodedToken } from '@/modules/auth/types/token-claims';

/**
 * Durable record of every outstanding access/refresh pair.
 *
 * The store is the revocation mechanism: a correctly signed, unexpired token
 * still does not authenticate unless a record holding it exists.
 * Also used as the DI token; see SessionsModule for the bound implementation.
 */
export abstract class SessionStore {
  /** Persist a new record and return it with its assigned id. */
  abstract save(record: NewSessionRecord): Promise<SessionRecord>;

  abstract accessTokenExists(token: EncodedToken): Promise<boolean>;
  abstract refreshTokenExists(token: EncodedToken): Promise<boolean>;

  abstract findByAccessToken(token: EncodedToken): Promise<SessionRecord | null>;
  abstract findByRefreshToken(token: EncodedToken): Promise<SessionRecord | null>;
  abstract findAll(): Promise<SessionRecord[]>;
  abstract findAllByUserId(userId: string): Promise<SessionRecord[]>;

  /** @returns the record that was removed, or null if none held the token */
  abstract deleteByAccessToken(token: EncodedToken): Promise<SessionRecord | null>;
  /** @returns the record that was removed, or null if none held the token */
  abstract deleteByRefreshToken(token: EncodedToken): Promise<SessionRecord | null>;
  /** @returns the records that were removed */
  abstract deleteAllByUserId(userId: string): Promise<SessionRecord[]>;

  /** Remove every record whose refresh token expired before `now`. */
  abstract deleteAllExpiredByRefreshTokenExpiration(now: Date): Promise<number>;

  /**
   * Replace the record holding `oldRefreshToken` with `replacement`.
   *
   * Fallback for stores without multi-row transactions: create first, then
   * delete the old record. If the old record is already gone (concurrent
   * rotation or revocation) the new record is removed again and the call fails,
   * so a refresh token can be rotated only once. A crash between the two steps
   * leaves both pairs valid until the cleanup job or natural expiry.
   *
   * @throws AuthenticationNotFoundError when no record holds `oldRefreshToken`
   */
  async rotate(oldRefreshToken: EncodedToken, replacement: NewSessionRecord): Promise<SessionRecord> {
    const saved = await this.save(replacement);
    const removed = await this.deleteByRefreshToken(oldRefreshToken);
    if (!removed) {
      await this.deleteByRefreshToken(saved.refreshToken.token);
      throw new AuthenticationNotFoundError('Session was already rotated or revoked');
    }
    return saved;
  }
}
