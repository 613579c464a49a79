// src/modules/infra/redis/redis.module.ts
import { Global, Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis, { type RedisOptions } from 'ioredis';
import type { Env } from '@/config/env.zod';

/**
 * Redis client, or null when REDIS_URL is not configured.
 * Consumers must treat Redis as optional.
 */
export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>): Redis | null => {
        const url = cfg.get('REDIS_URL', { infer: true });
        if (!url) return null;

        const logger = new Logger('Redis');
        const u = new URL(url);
        logger.debug(`${u.protocol}//${u.hostname}:${u.port || 6379}`);

        const options: RedisOptions = {
          // Force DB to 0 for managed Redis providers that may not support SELECT
          db: 0,
          lazyConnect: true,
          retryStrategy: (times: number) => Math.min(times * 50, 2000),
        };
        // ioredis enables TLS automatically when using rediss://
        const client = new Redis(url, options);
        client.on('error', (err: Error) => {
          logger.error('Redis error', err.stack);
        });
        return client;
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnModuleDestroy {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis | null) {}

  async onModuleDestroy() {
    if (!this.redis) return;
    if (this.redis.status === 'ready') {
      await this.redis.quit();
    } else {
      this.redis.disconnect();
    }
  }
}
