/**
 * Access-token guard: extracts the token, runs it through TokenVerifier and
 * attaches the authenticated principal to `req.user`.
 * Any failure surfaces as an AuthError, which AuthExceptionFilter turns into a bare 401.
 */
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { AuthenticationNotFoundError } from './auth.errors';
import type { AuthenticatedRequest } from './current-user.decorator';
import { TokenVerifier } from './jwt/token.verifier';
import { accessTokenExtractor } from './token.extractor';
import type { AuthenticatedPrincipal } from './types/principal';
import type { TokenClaims } from './types/token-claims';

export function toAuthenticatedPrincipal(claims: TokenClaims): AuthenticatedPrincipal {
  return {
    username: claims.subject,
    role: claims.role,
    authorities: [`ROLE_${claims.role}`],
  };
}

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly verifier: TokenVerifier) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const token = accessTokenExtractor(req);
    if (!token) {
      throw new AuthenticationNotFoundError('No access token on request');
    }

    const claims = await this.verifier.verifyAccessToken(token);
    req.user = toAuthenticatedPrincipal(claims);
    return true;
  }
}
