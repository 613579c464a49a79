// src/modules/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import type { Env } from '@/config/env.zod';
import { SessionsModule } from '@/modules/sessions/sessions.module';
import { UsersModule } from '@/modules/users/users.module';
import { AuthController } from './auth.controller';
import { AuthExceptionFilter } from './auth-exception.filter';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './jwt.guard';
import { ClaimsBuilder } from './jwt/claims.builder';
import { AUTH_SETTINGS, type AuthSettings, JWT_ALGORITHM } from './jwt/jwt.constants';
import { TokenCodec } from './jwt/token.codec';
import { TokenIssuer } from './jwt/token.issuer';
import { TokenVerifier } from './jwt/token.verifier';
import { RolesGuard } from './roles.guard';

@Module({
  imports: [
    ConfigModule,
    UsersModule,
    SessionsModule,
    // Single process-wide HMAC key; lifetimes are carried in the claims, not in signOptions
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>) => {
        const secret: string = cfg.get('JWT_SECRET', { infer: true });
        return {
          secret: Buffer.from(secret, 'base64'),
          signOptions: { algorithm: JWT_ALGORITHM },
          verifyOptions: { algorithms: [JWT_ALGORITHM] },
        };
      },
    }),
  ],
  providers: [
    {
      provide: AUTH_SETTINGS,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>): AuthSettings => ({
        accessTokenTtlSeconds: cfg.get('JWT_ACCESS_TOKEN_TTL_SECONDS', { infer: true }),
        refreshTokenTtlSeconds: cfg.get('JWT_REFRESH_TOKEN_TTL_SECONDS', { infer: true }),
      }),
    },
    { provide: APP_FILTER, useClass: AuthExceptionFilter },
    ClaimsBuilder,
    TokenCodec,
    TokenIssuer,
    TokenVerifier,
    AuthService,
    JwtAuthGuard,
    RolesGuard,
  ],
  controllers: [AuthController],
  exports: [AuthService, TokenVerifier, JwtAuthGuard, RolesGuard],
})
export class AuthModule {}
