// src/modules/auth/types/session-record.ts
import type { IssuedToken } from './token-claims';

/**
 * One login event: the access/refresh pair handed out together.
 * Records are created and deleted, never updated.
 */
export interface SessionRecord {
  sessionId: string;
  userId: string;
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
}

/** A record before the store has assigned its id. */
export type NewSessionRecord = Omit<SessionRecord, 'sessionId'>;
