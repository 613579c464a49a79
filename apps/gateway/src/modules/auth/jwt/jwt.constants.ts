// src/modules/auth/jwt/jwt.constants.ts
import type { Algorithm } from 'jsonwebtoken';

/** The only accepted signing algorithm. */
export const JWT_ALGORITHM: Algorithm = 'HS256';

export const AUTH_SETTINGS = Symbol('AUTH_SETTINGS');

/** Token lifetimes, resolved from configuration at boot. */
export interface AuthSettings {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

export const CLOCK = Symbol('CLOCK');

/** Injectable time source so claim timestamps and cleanup cut-offs can be pinned in tests. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
