// src/modules/infra/infra.module.ts
import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/modules/infra/database/database.module';
import { RedisModule } from '@/modules/infra/redis/redis.module';

@Module({
  imports: [DatabaseModule, RedisModule],
  exports: [DatabaseModule, RedisModule],
})
export class InfraModule {}
