// src/modules/auth/jwt/claims.builder.ts
import { Inject, Injectable } from '@nestjs/common';
import type { Principal } from '../types/principal';
import type { Role } from '../types/role';
import { type TokenClaims, TokenUse } from '../types/token-claims';
import {
  AUTH_SETTINGS,
  type AuthSettings,
  CLOCK,
  type Clock,
  fromEpochSeconds,
  toEpochSeconds,
} from './jwt.constants';

/**
 * Builds the claim set of a token about to be issued.
 * issuedAt is truncated to whole seconds; expiration = issuedAt + TTL of the token use.
 */
@Injectable()
export class ClaimsBuilder {
  constructor(
    @Inject(AUTH_SETTINGS) private readonly settings: AuthSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  buildClaims(principal: Principal, tokenUse: TokenUse): TokenClaims {
    return this.buildClaimsFor(principal.username, principal.role, tokenUse);
  }

  /** Variant for refresh flows, where only the decoded identity is at hand. */
  buildClaimsFor(subject: string, role: Role, tokenUse: TokenUse): TokenClaims {
    const issuedAt = toEpochSeconds(this.clock());
    const ttl =
      tokenUse === TokenUse.ACCESS
        ? this.settings.accessTokenTtlSeconds
        : this.settings.refreshTokenTtlSeconds;

    return {
      subject,
      tokenUse,
      role,
      issuedAt: fromEpochSeconds(issuedAt),
      expiration: fromEpochSeconds(issuedAt + ttl),
    };
  }
}
