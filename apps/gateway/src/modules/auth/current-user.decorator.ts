/**
 * Custom parameter decorator to inject the authenticated principal into controllers.
 */
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { AuthenticatedPrincipal } from './types/principal';

export type AuthenticatedRequest = Request & { user?: AuthenticatedPrincipal };

/**
 * CurrentUser decorator extracts `req.user`, set by JwtAuthGuard.
 *
 * Usage:
 * ```ts
 * @CurrentUser() user: AuthenticatedPrincipal | null
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedPrincipal | null => {
    const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return req.user ?? null;
  },
);
