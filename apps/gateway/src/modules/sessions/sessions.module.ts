// src/modules/sessions/sessions.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';
import type { Env } from '@/config/env.zod';
import { CLOCK, type Clock, systemClock } from '@/modules/auth/jwt/jwt.constants';
import { REDIS_CLIENT } from '@/modules/infra/redis/redis.module';
import { CachedSessionStore } from './cached-session.store';
import { CLEANUP_SETTINGS, type CleanupSettings, ExpiryCleanupJob } from './expiry-cleanup.job';
import { PgSessionStore } from './pg-session.store';
import { SessionStore } from './session.store';
import { RedisTokenPairCache } from './token-pair.cache';

@Module({
  providers: [
    { provide: CLOCK, useValue: systemClock },
    PgSessionStore,
    {
      // Redis fronts the durable store only when REDIS_URL is configured
      provide: SessionStore,
      inject: [PgSessionStore, REDIS_CLIENT, CLOCK],
      useFactory: (pg: PgSessionStore, redis: Redis | null, clock: Clock): SessionStore =>
        redis ? new CachedSessionStore(pg, new RedisTokenPairCache(redis, clock)) : pg,
    },
    {
      provide: CLEANUP_SETTINGS,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>): CleanupSettings => ({
        enabled: cfg.get('SESSION_CLEANUP_ENABLED', { infer: true }),
        intervalSeconds: cfg.get('SESSION_CLEANUP_INTERVAL_SECONDS', { infer: true }),
      }),
    },
    ExpiryCleanupJob,
  ],
  exports: [SessionStore, CLOCK, ExpiryCleanupJob],
})
export class SessionsModule {}
