/**
 * Fast-access existence cache for issued token pairs.
 * - Keys: `jwt:access_token:<token>` / `jwt:refresh_token:<token>`, empty value.
 * - TTL follows the remaining lifetime of each token (min 1s), so entries
 *   disappear on their own once the token could no longer verify anyway.
 */
// src/modules/sessions/token-pair.cache.ts
import type Redis from 'ioredis';
import type { SessionRecord } from '@/modules/auth/types/session-record';
import type { EncodedToken, IssuedToken } from '@/modules/auth/types/token-claims';
import type { Clock } from '@/modules/auth/jwt/jwt.constants';

export const ACCESS_TOKEN_PREFIX = 'jwt:access_token:';
export const REFRESH_TOKEN_PREFIX = 'jwt:refresh_token:';

export abstract class TokenPairCache {
  abstract store(record: SessionRecord): Promise<void>;
  abstract evict(record: SessionRecord): Promise<void>;
  abstract accessTokenExists(token: EncodedToken): Promise<boolean>;
  abstract refreshTokenExists(token: EncodedToken): Promise<boolean>;
}

export class RedisTokenPairCache extends TokenPairCache {
  constructor(
    private readonly redis: Redis,
    private readonly clock: Clock,
  ) {
    super();
  }

  async store(record: SessionRecord): Promise<void> {
    await Promise.all([
      this.redis.set(
        ACCESS_TOKEN_PREFIX + record.accessToken.token,
        '',
        'EX',
        this.ttlSeconds(record.accessToken),
      ),
      this.redis.set(
        REFRESH_TOKEN_PREFIX + record.refreshToken.token,
        '',
        'EX',
        this.ttlSeconds(record.refreshToken),
      ),
    ]);
  }

  async evict(record: SessionRecord): Promise<void> {
    await this.redis.del(
      ACCESS_TOKEN_PREFIX + record.accessToken.token,
      REFRESH_TOKEN_PREFIX + record.refreshToken.token,
    );
  }

  async accessTokenExists(token: EncodedToken): Promise<boolean> {
    return (await this.redis.exists(ACCESS_TOKEN_PREFIX + token)) > 0;
  }

  async refreshTokenExists(token: EncodedToken): Promise<boolean> {
    return (await this.redis.exists(REFRESH_TOKEN_PREFIX + token)) > 0;
  }

  private ttlSeconds(issued: IssuedToken): number {
    const remaining = Math.floor(
      (issued.claims.expiration.getTime() - this.clock().getTime()) / 1000,
    );
    return Math.max(remaining, 1);
  }
}
