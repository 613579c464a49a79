// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from '@/config/env.zod';
import { AuthModule } from '@/modules/auth/auth.module';
import { InfraModule } from '@/modules/infra/infra.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'], // relative to apps/gateway
      validate: validateEnv,
    }),
    InfraModule,
    AuthModule,
  ],
})
export class AppModule {}
