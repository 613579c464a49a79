// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import cookieParser from 'cookie-parser';
import { AppModule } from './app.module';
import type { Env } from '@/config/env.zod';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
  });
  // runs OnModuleDestroy hooks (cleanup timer, pg pool, redis) on SIGINT/SIGTERM
  app.enableShutdownHooks();

  app.use(cookieParser());
  app.enableCors({ origin: [/localhost:\d+/], credentials: true });

  const cfg = app.get<ConfigService<Env, true>>(ConfigService);
  const port = cfg.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');

  new Logger('Bootstrap').debug(`Gateway up on :${port}`);
}
void bootstrap();
