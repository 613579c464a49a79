// src/modules/auth/token.extractor.ts
import { ExtractJwt, type JwtFromRequestFunction } from 'passport-jwt';
import { readCookie } from '@/common/utils/cookie.util';

export const ACCESS_TOKEN_COOKIE = 'access_token';

/**
 * Access token lookup order:
 * 1. `access_token` cookie
 * 2. Authorization header (Bearer token)
 */
export const accessTokenExtractor: JwtFromRequestFunction = ExtractJwt.fromExtractors([
  (req: unknown) => readCookie(req, ACCESS_TOKEN_COOKIE),
  ExtractJwt.fromAuthHeaderAsBearerToken(),
]);
