// src/modules/auth/jwt/token.issuer.ts
import { Injectable, Logger } from '@nestjs/common';
import type { Principal } from '../types/principal';
import type { Role } from '../types/role';
import { type IssuedToken, type TokenClaims, TokenUse } from '../types/token-claims';
import { ClaimsBuilder } from './claims.builder';
import { TokenCodec } from './token.codec';

export interface IssuedPair {
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
}

/**
 * Issues access/refresh tokens either for a full Principal (login)
 * or for a bare subject + role (refresh, where only decoded claims are available).
 */
@Injectable()
export class TokenIssuer {
  private readonly logger = new Logger(TokenIssuer.name);

  constructor(
    private readonly claims: ClaimsBuilder,
    private readonly codec: TokenCodec,
  ) {}

  issueAccessToken(principal: Principal): IssuedToken;
  issueAccessToken(subject: string, role: Role): IssuedToken;
  issueAccessToken(target: Principal | string, role?: Role): IssuedToken {
    return this.issue(this.claimsFor(target, role, TokenUse.ACCESS));
  }

  issueRefreshToken(principal: Principal): IssuedToken;
  issueRefreshToken(subject: string, role: Role): IssuedToken;
  issueRefreshToken(target: Principal | string, role?: Role): IssuedToken {
    return this.issue(this.claimsFor(target, role, TokenUse.REFRESH));
  }

  issuePair(principal: Principal): IssuedPair;
  issuePair(subject: string, role: Role): IssuedPair;
  issuePair(target: Principal | string, role?: Role): IssuedPair {
    return {
      accessToken: this.issue(this.claimsFor(target, role, TokenUse.ACCESS)),
      refreshToken: this.issue(this.claimsFor(target, role, TokenUse.REFRESH)),
    };
  }

  private claimsFor(target: Principal | string, role: Role | undefined, use: TokenUse): TokenClaims {
    if (typeof target !== 'string') return this.claims.buildClaims(target, use);
    if (role === undefined) {
      throw new TypeError('role is required when issuing a token for a bare subject');
    }
    return this.claims.buildClaimsFor(target, role, use);
  }

  private issue(claims: TokenClaims): IssuedToken {
    this.logger.debug(`issuing ${claims.tokenUse} token for ${claims.subject}`);
    return { token: this.codec.encode(claims), claims };
  }
}
