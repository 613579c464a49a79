/**
 * TokenVerifier
 * - End-to-end check of an incoming token: signature/expiry -> token use -> session existence.
 * - The order is fixed: the cheap stateless checks run before the store round-trip.
 */
// src/modules/auth/jwt/token.verifier.ts
import { Injectable, Logger } from '@nestjs/common';
import { SessionStore } from '@/modules/sessions/session.store';
import {
  AuthenticationNotFoundError,
  InvalidJwtError,
  TokenDecodeError,
  UnexpectedTokenTypeError,
} from '../auth.errors';
import { type EncodedToken, type TokenClaims, TokenUse } from '../types/token-claims';
import { TokenCodec } from './token.codec';

@Injectable()
export class TokenVerifier {
  private readonly logger = new Logger(TokenVerifier.name);

  constructor(
    private readonly codec: TokenCodec,
    private readonly store: SessionStore,
  ) {}

  /**
   * @throws InvalidJwtError | UnexpectedTokenTypeError | AuthenticationNotFoundError
   */
  verifyAccessToken(token: EncodedToken): Promise<TokenClaims> {
    return this.verify(token, TokenUse.ACCESS, (t) => this.store.accessTokenExists(t));
  }

  /**
   * @throws InvalidJwtError | UnexpectedTokenTypeError | AuthenticationNotFoundError
   */
  verifyRefreshToken(token: EncodedToken): Promise<TokenClaims> {
    return this.verify(token, TokenUse.REFRESH, (t) => this.store.refreshTokenExists(t));
  }

  private async verify(
    token: EncodedToken,
    expected: TokenUse,
    exists: (token: EncodedToken) => Promise<boolean>,
  ): Promise<TokenClaims> {
    let claims: TokenClaims;
    try {
      claims = this.codec.decode(token);
    } catch (e: unknown) {
      if (e instanceof TokenDecodeError) {
        this.logger.warn(`${expected} token rejected: ${e.name}`);
        throw new InvalidJwtError(`${expected} token is not valid: ${e.message}`, e);
      }
      throw e;
    }

    if (claims.tokenUse !== expected) {
      this.logger.warn(`expected ${expected} token, got ${claims.tokenUse} (subject ${claims.subject})`);
      throw new UnexpectedTokenTypeError(`Token is a ${claims.tokenUse} token, not ${expected}`);
    }

    if (!(await exists(token))) {
      this.logger.warn(`${expected} token of ${claims.subject} has no session`);
      throw new AuthenticationNotFoundError(`No session holds this ${expected} token`);
    }

    return claims;
  }
}
