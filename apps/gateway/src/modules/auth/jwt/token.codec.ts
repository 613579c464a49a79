/**
 * TokenCodec
 * - Encodes TokenClaims into a compact HS256 JWS and back.
 * - The only place in the service where signatures are checked.
 * - Maps jsonwebtoken failures onto the TokenDecodeError taxonomy.
 */
// src/modules/auth/jwt/token.codec.ts
import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'node:crypto';
import { JsonWebTokenError, NotBeforeError, TokenExpiredError } from 'jsonwebtoken';
import { z } from 'zod';
import {
  ExpiredTokenError,
  InvalidSignatureError,
  MalformedTokenError,
  type TokenDecodeError,
  UnsupportedTokenError,
} from '../auth.errors';
import { parseRole } from '../types/role';
import {
  type EncodedToken,
  type JwtPayload,
  TOKEN_TYPE_HEADER,
  type TokenClaims,
  TokenUse,
} from '../types/token-claims';
import { fromEpochSeconds, JWT_ALGORITHM, toEpochSeconds } from './jwt.constants';

const PayloadZ = z.object({
  sub: z.string().min(1),
  role: z.string(),
  token_use: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().optional(),
});

const CompleteTokenZ = z.object({
  header: z.object({
    alg: z.string(),
    typ: z.string().optional(),
  }),
});

// jsonwebtoken reports these as plain JsonWebTokenError; they all mean "not a token we sign"
const UNSUPPORTED_MESSAGES = [
  'jwt signature is required',
  'invalid algorithm',
  'please specify "none" in "algorithms" to verify unsigned tokens',
];

function tokenUseFromType(typ: string | undefined): TokenUse | null {
  if (typ === TOKEN_TYPE_HEADER[TokenUse.ACCESS]) return TokenUse.ACCESS;
  if (typ === TOKEN_TYPE_HEADER[TokenUse.REFRESH]) return TokenUse.REFRESH;
  return null;
}

function toDecodeError(err: unknown): TokenDecodeError {
  // TokenExpiredError and NotBeforeError extend JsonWebTokenError: check them first
  if (err instanceof TokenExpiredError) {
    return new ExpiredTokenError(`Token expired at ${err.expiredAt.toISOString()}`, err.expiredAt, {
      cause: err,
    });
  }
  if (err instanceof NotBeforeError) {
    return new UnsupportedTokenError('Token is not active yet', { cause: err });
  }
  if (err instanceof JsonWebTokenError) {
    if (err.message === 'invalid signature') {
      return new InvalidSignatureError('Token signature does not match', { cause: err });
    }
    if (
      UNSUPPORTED_MESSAGES.includes(err.message) ||
      err.message.startsWith('secretOrPublicKey must be')
    ) {
      return new UnsupportedTokenError(`Unsupported token: ${err.message}`, { cause: err });
    }
    return new MalformedTokenError(`Malformed token: ${err.message}`, { cause: err });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new MalformedTokenError(`Malformed token: ${reason}`, { cause: err });
}

@Injectable()
export class TokenCodec {
  private readonly logger = new Logger(TokenCodec.name);

  constructor(private readonly jwt: JwtService) {}

  encode(claims: TokenClaims): EncodedToken {
    const payload: JwtPayload = {
      sub: claims.subject,
      role: claims.role,
      token_use: claims.tokenUse,
      iat: toEpochSeconds(claims.issuedAt),
      exp: toEpochSeconds(claims.expiration),
      // two pairs minted in the same second for the same user must still differ
      jti: randomUUID(),
    };

    return this.jwt.sign(payload, {
      algorithm: JWT_ALGORITHM,
      header: { alg: JWT_ALGORITHM, typ: TOKEN_TYPE_HEADER[claims.tokenUse] },
    });
  }

  /**
   * Verify signature and expiry, then rebuild the claims.
   * @throws MalformedTokenError | InvalidSignatureError | ExpiredTokenError | UnsupportedTokenError
   */
  decode(token: EncodedToken): TokenClaims {
    let verified: object;
    try {
      verified = this.jwt.verify<object>(token, { algorithms: [JWT_ALGORITHM] });
    } catch (err: unknown) {
      const mapped = toDecodeError(err);
      this.logger.debug(`decode rejected: ${mapped.name} (${mapped.message})`);
      throw mapped;
    }

    const complete = CompleteTokenZ.safeParse(this.jwt.decode<unknown>(token, { complete: true }));
    if (!complete.success) {
      throw new MalformedTokenError('Token header could not be read');
    }
    const headerUse = tokenUseFromType(complete.data.header.typ);
    if (headerUse === null) {
      throw new UnsupportedTokenError(`Unknown token type "${complete.data.header.typ ?? ''}"`);
    }

    const payload = PayloadZ.safeParse(verified);
    if (!payload.success) {
      throw new MalformedTokenError('Token claims are missing or ill-typed');
    }
    const { sub, role, token_use, iat, exp } = payload.data;

    const parsedRole = parseRole(role);
    if (parsedRole === null) {
      throw new MalformedTokenError(`Unknown role "${role}"`);
    }
    if (token_use !== headerUse) {
      throw new MalformedTokenError(`Claim token_use "${token_use}" does not match token type`);
    }
    if (iat >= exp) {
      throw new MalformedTokenError('Token issued-at is not before its expiration');
    }

    return {
      subject: sub,
      tokenUse: headerUse,
      role: parsedRole,
      issuedAt: fromEpochSeconds(iat),
      expiration: fromEpochSeconds(exp),
    };
  }
}
