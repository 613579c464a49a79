import { z } from 'zod';

/**
 * Login request body (POST /v1/auth/token)
 */
export const LoginRequestZ = z.object({
  username: z.email().max(254),
  password: z.string().min(1).max(256),
});

/**
 * Refresh request body (POST /v1/auth/refresh)
 */
export const RefreshRequestZ = z.object({
  refreshToken: z.string().min(1),
});

/**
 * Revoke request body (POST /v1/auth/revoke)
 */
export const RevokeRequestZ = z.object({
  accessToken: z.string().min(1),
});

/**
 * Token view. Timestamps are Unix seconds.
 */
export const TokenViewZ = z.object({
  tokenType: z.literal('Bearer'),
  token: z.string().min(10),
  issuedAt: z.number().int(),
  expiresIn: z.number().int().positive(),
  expiresAt: z.number().int(),
});

/**
 * Access + refresh pair returned by login and refresh.
 */
export const AuthViewZ = z.object({
  access: TokenViewZ,
  refresh: TokenViewZ,
});

export const MeViewZ = z.object({
  username: z.string(),
  role: z.enum(['USER', 'ADMIN']),
});

export const RevokeAllViewZ = z.object({
  revoked: z.number().int().nonnegative(),
});

export type LoginRequestZod = z.infer<typeof LoginRequestZ>;
export type RefreshRequestZod = z.infer<typeof RefreshRequestZ>;
export type RevokeRequestZod = z.infer<typeof RevokeRequestZ>;
export type TokenViewZod = z.infer<typeof TokenViewZ>;
export type AuthViewZod = z.infer<typeof AuthViewZ>;
export type MeViewZod = z.infer<typeof MeViewZ>;
export type RevokeAllViewZod = z.infer<typeof RevokeAllViewZ>;
