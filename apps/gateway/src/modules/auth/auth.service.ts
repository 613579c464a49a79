/**
 * AuthService
 * - Login: credential check -> issue access/refresh pair -> persist a new session.
 * - Refresh: verify refresh token -> issue a new pair -> rotate the session.
 * - Revoke: verify access token -> delete its session (both tokens die together).
 */
// src/modules/auth/auth.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { UsersRepository } from '@/modules/users/users.repository';
import { PasswordVerifier, UNKNOWN_USER_HASH } from '@/modules/users/password/password.verifier';
import { SessionStore } from '@/modules/sessions/session.store';
import { AuthenticationFailedError, AuthenticationNotFoundError } from './auth.errors';
import { TokenIssuer } from './jwt/token.issuer';
import { TokenVerifier } from './jwt/token.verifier';
import type { SessionRecord } from './types/session-record';
import type { EncodedToken } from './types/token-claims';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersRepo: UsersRepository,
    private readonly passwords: PasswordVerifier,
    private readonly issuer: TokenIssuer,
    private readonly verifier: TokenVerifier,
    private readonly sessions: SessionStore,
  ) {}

  /**
   * Validate credentials and open a new session.
   * Existing sessions of the user are left alone (multi-device).
   * @throws AuthenticationFailedError for an unknown username or a wrong password alike
   */
  async authenticate(username: string, rawPassword: string): Promise<SessionRecord> {
    const user = await this.usersRepo.findByUsername(username);
    // unknown usernames still pay for a hash check
    const valid = await this.passwords.matches(
      rawPassword,
      user?.passwordHash ?? UNKNOWN_USER_HASH,
    );
    if (!user || !valid) {
      this.logger.warn('Login rejected');
      throw new AuthenticationFailedError();
    }

    const pair = this.issuer.issuePair(user.principal);
    const session = await this.sessions.save({ userId: user.principal.userId, ...pair });
    this.logger.debug(`session ${session.sessionId} opened for user ${session.userId}`);
    return session;
  }

  /**
   * Exchange a refresh token for a brand-new pair. The old pair stops validating.
   * @throws InvalidJwtError | UnexpectedTokenTypeError | AuthenticationNotFoundError
   */
  async refresh(refreshToken: EncodedToken): Promise<SessionRecord> {
    const claims = await this.verifier.verifyRefreshToken(refreshToken);

    const current = await this.sessions.findByRefreshToken(refreshToken);
    if (!current) {
      throw new AuthenticationNotFoundError('Session was already rotated or revoked');
    }

    const pair = this.issuer.issuePair(claims.subject, claims.role);
    const session = await this.sessions.rotate(refreshToken, { userId: current.userId, ...pair });
    this.logger.debug(`session ${current.sessionId} rotated to ${session.sessionId}`);
    return session;
  }

  /**
   * Revoke the session holding `accessToken`; its refresh token dies with it.
   * @throws InvalidJwtError | UnexpectedTokenTypeError | AuthenticationNotFoundError
   */
  async revoke(accessToken: EncodedToken): Promise<void> {
    const claims = await this.verifier.verifyAccessToken(accessToken);

    const removed = await this.sessions.deleteByAccessToken(accessToken);
    if (!removed) {
      throw new AuthenticationNotFoundError('Session was already revoked');
    }
    this.logger.debug(`session of ${claims.subject} revoked`);
  }

  /** Revoke every session of a user. */
  async revokeAll(userId: string): Promise<number> {
    const removed = await this.sessions.deleteAllByUserId(userId);
    this.logger.log(`revoked ${removed.length} sessions of user ${userId}`);
    return removed.length;
  }
}
