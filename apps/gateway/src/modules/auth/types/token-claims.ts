// src/modules/auth/types/token-claims.ts
import type { Role } from './role';

/**
 * Discriminates access from refresh tokens.
 * The enum value is what goes into the `token_use` claim.
 */
export enum TokenUse {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/** JOSE header `typ` per token use. */
export const TOKEN_TYPE_HEADER: Readonly<Record<TokenUse, string>> = {
  [TokenUse.ACCESS]: 'at+jwt',
  [TokenUse.REFRESH]: 'rt+jwt',
};

/**
 * Claim set of an issued token.
 * Timestamps have second precision; `issuedAt` is always before `expiration`.
 */
export interface TokenClaims {
  /** Principal username. */
  subject: string;
  tokenUse: TokenUse;
  role: Role;
  issuedAt: Date;
  expiration: Date;
}

/** Compact JWS string. */
export type EncodedToken = string;

/** Encoded token kept together with the claims it was built from. */
export interface IssuedToken {
  token: EncodedToken;
  claims: TokenClaims;
}

/** Wire representation of TokenClaims. */
export interface JwtPayload {
  sub: string;
  role: string;
  token_use: string;
  /** Unix seconds */
  iat: number;
  /** Unix seconds */
  exp: number;
  /** Random per encode */
  jti: string;
}
