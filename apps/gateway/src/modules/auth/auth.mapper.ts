// src/modules/auth/auth.mapper.ts
import { AuthViewZ, type AuthViewZod, type TokenViewZod } from '@warden/types-zod';
import { toEpochSeconds } from './jwt/jwt.constants';
import type { SessionRecord } from './types/session-record';
import type { IssuedToken } from './types/token-claims';

export function toTokenView(issued: IssuedToken): TokenViewZod {
  const issuedAt = toEpochSeconds(issued.claims.issuedAt);
  const expiresAt = toEpochSeconds(issued.claims.expiration);
  return {
    tokenType: 'Bearer',
    token: issued.token,
    issuedAt,
    expiresIn: expiresAt - issuedAt,
    expiresAt,
  };
}

/** Normalize and validate the response shape with Zod before returning to the controller. */
export function toAuthView(session: SessionRecord): AuthViewZod {
  return AuthViewZ.parse({
    access: toTokenView(session.accessToken),
    refresh: toTokenView(session.refreshToken),
  });
}
