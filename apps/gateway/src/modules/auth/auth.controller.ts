// src/modules/auth/auth.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ZodValidationPipe } from 'nestjs-zod';
import {
  type AuthViewZod,
  LoginRequestZ,
  type LoginRequestZod,
  MeViewZ,
  type MeViewZod,
  RefreshRequestZ,
  type RefreshRequestZod,
  RevokeAllViewZ,
  type RevokeAllViewZod,
  RevokeRequestZ,
  type RevokeRequestZod,
} from '@warden/types-zod';
import { AuthService } from './auth.service';
import { AuthenticationNotFoundError } from './auth.errors';
import { toAuthView } from './auth.mapper';
import { CurrentUser } from './current-user.decorator';
import { JwtAuthGuard } from './jwt.guard';
import { Roles, RolesGuard } from './roles.guard';
import type { AuthenticatedPrincipal } from './types/principal';
import { Role } from './types/role';

/**
 * AuthController handles token issuance, refresh, revocation and principal lookup.
 * All routes are prefixed with /v1/auth. Authentication failures of any kind
 * answer 401 with an empty body (AuthExceptionFilter).
 */
@Controller('v1/auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  /**
   * POST /v1/auth/token
   * Validates credentials and opens a new session.
   */
  @Post('token')
  @HttpCode(200)
  async token(
    @Body(new ZodValidationPipe(LoginRequestZ)) dto: LoginRequestZod,
  ): Promise<AuthViewZod> {
    const session = await this.auth.authenticate(dto.username, dto.password);
    return toAuthView(session);
  }

  /**
   * POST /v1/auth/refresh
   * Rotates the session of a valid refresh token; the old pair stops working.
   */
  @Post('refresh')
  @HttpCode(200)
  async refresh(
    @Body(new ZodValidationPipe(RefreshRequestZ)) dto: RefreshRequestZod,
  ): Promise<AuthViewZod> {
    const session = await this.auth.refresh(dto.refreshToken);
    return toAuthView(session);
  }

  /**
   * POST /v1/auth/revoke
   * Deletes the session of a valid access token (logout).
   */
  @Post('revoke')
  @HttpCode(204)
  async revoke(@Body(new ZodValidationPipe(RevokeRequestZ)) dto: RevokeRequestZod): Promise<void> {
    await this.auth.revoke(dto.accessToken);
  }

  /**
   * GET /v1/auth/me
   * Returns the principal of the presented access token.
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  me(@CurrentUser() user: AuthenticatedPrincipal | null): MeViewZod {
    if (!user) throw new AuthenticationNotFoundError('No authenticated principal on request');
    return MeViewZ.parse({ username: user.username, role: user.role });
  }

  /**
   * DELETE /v1/auth/users/:userId/sessions
   * Administrators only: revokes every session of a user.
   */
  @Delete('users/:userId/sessions')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles(Role.ADMIN)
  async revokeAll(
    @Param('userId', new ParseUUIDPipe()) userId: string,
  ): Promise<RevokeAllViewZod> {
    const revoked = await this.auth.revokeAll(userId);
    return RevokeAllViewZ.parse({ revoked });
  }
}
