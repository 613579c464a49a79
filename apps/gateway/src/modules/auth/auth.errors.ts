// src/modules/auth/auth.errors.ts
/**
 * Authentication error taxonomy.
 *
 * Every error here is reported to clients as a bare 401 (see AuthExceptionFilter);
 * the distinct classes exist for logs and internal control flow only.
 */
export abstract class AuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by TokenCodec.decode. */
export abstract class TokenDecodeError extends AuthError {}

/** Not a compact JWS, or claims are missing / ill-typed. */
export class MalformedTokenError extends TokenDecodeError {}

/** Signature does not match the shared secret. */
export class InvalidSignatureError extends TokenDecodeError {}

/** Signature is valid but the token is past its expiration. */
export class ExpiredTokenError extends TokenDecodeError {
  constructor(
    message: string,
    readonly expiredAt?: Date,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Unsigned token, unexpected algorithm or unknown token type. */
export class UnsupportedTokenError extends TokenDecodeError {}

/** Verifier-level wrapper around a TokenDecodeError (kept as `cause`). */
export class InvalidJwtError extends AuthError {
  constructor(
    message: string,
    readonly cause: TokenDecodeError,
  ) {
    super(message, { cause });
  }
}

/** Token decoded fine but is of the wrong kind for the operation. */
export class UnexpectedTokenTypeError extends AuthError {}

/** Token is valid but no session holds it (revoked, rotated or never issued). */
export class AuthenticationNotFoundError extends AuthError {}

/** Login failed. Unknown username and wrong password are deliberately not told apart. */
export class AuthenticationFailedError extends AuthError {
  constructor() {
    super('Invalid credentials');
  }
}
