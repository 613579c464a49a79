/**
 * CachedSessionStore
 * - Decorates the durable SessionStore with the Redis token-pair cache.
 * - Existence checks hit the cache first; a miss falls through to the durable store.
 * - Every path that removes a record also evicts its two cache keys.
 */
// src/modules/sessions/cached-session.store.ts
import { Logger } from '@nestjs/common';
import type { NewSessionRecord, SessionRecord } from '@/modules/auth/types/session-record';
import type { EncodedToken } from '@/modules/auth/types/token-claims';
import { SessionStore } from './session.store';
import { TokenPairCache } from './token-pair.cache';

export class CachedSessionStore extends SessionStore {
  private readonly logger = new Logger(CachedSessionStore.name);

  constructor(
    private readonly durable: SessionStore,
    private readonly cache: TokenPairCache,
  ) {
    super();
  }

  async save(record: NewSessionRecord): Promise<SessionRecord> {
    const saved = await this.durable.save(record);
    await this.cache.store(saved);
    return saved;
  }

  async accessTokenExists(token: EncodedToken): Promise<boolean> {
    if (await this.cache.accessTokenExists(token)) return true;
    return this.durable.accessTokenExists(token);
  }

  async refreshTokenExists(token: EncodedToken): Promise<boolean> {
    if (await this.cache.refreshTokenExists(token)) return true;
    return this.durable.refreshTokenExists(token);
  }

  findByAccessToken(token: EncodedToken): Promise<SessionRecord | null> {
    return this.durable.findByAccessToken(token);
  }

  findByRefreshToken(token: EncodedToken): Promise<SessionRecord | null> {
    return this.durable.findByRefreshToken(token);
  }

  findAll(): Promise<SessionRecord[]> {
    return this.durable.findAll();
  }

  findAllByUserId(userId: string): Promise<SessionRecord[]> {
    return this.durable.findAllByUserId(userId);
  }

  // evict exactly what the durable delete removed
  async deleteByAccessToken(token: EncodedToken): Promise<SessionRecord | null> {
    const removed = await this.durable.deleteByAccessToken(token);
    if (removed) await this.cache.evict(removed);
    return removed;
  }

  async deleteByRefreshToken(token: EncodedToken): Promise<SessionRecord | null> {
    const removed = await this.durable.deleteByRefreshToken(token);
    if (removed) await this.cache.evict(removed);
    return removed;
  }

  async deleteAllByUserId(userId: string): Promise<SessionRecord[]> {
    const removed = await this.durable.deleteAllByUserId(userId);
    await Promise.all(removed.map((r) => this.cache.evict(r)));
    return removed;
  }

  // cache entries of expired sessions lapse through their own TTL
  deleteAllExpiredByRefreshTokenExpiration(now: Date): Promise<number> {
    return this.durable.deleteAllExpiredByRefreshTokenExpiration(now);
  }

  override async rotate(
    oldRefreshToken: EncodedToken,
    replacement: NewSessionRecord,
  ): Promise<SessionRecord> {
    const previous = await this.durable.findByRefreshToken(oldRefreshToken);
    const saved = await this.durable.rotate(oldRefreshToken, replacement);
    if (previous) await this.cache.evict(previous);
    await this.cache.store(saved);
    this.logger.debug(`rotated session ${previous?.sessionId ?? '?'} -> ${saved.sessionId}`);
    return saved;
  }
}
