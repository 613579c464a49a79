// src/modules/sessions/session.zod.ts
import { z } from 'zod';
import { RoleZ } from '@/modules/auth/types/role';

/** Row shape of `jwt_authentications` (see db/schema.sql). */
export const SessionRowSchema = z.object({
  id: z.uuid(),
  user_id: z.uuid(),
  access_token: z.string().min(1),
  access_token_subject: z.string().min(1),
  access_token_role: RoleZ,
  access_token_issued_at: z.date(),
  access_token_expiration: z.date(),
  refresh_token: z.string().min(1),
  refresh_token_subject: z.string().min(1),
  refresh_token_role: RoleZ,
  refresh_token_issued_at: z.date(),
  refresh_token_expiration: z.date(),
});

export type SessionRow = z.infer<typeof SessionRowSchema>;

export const SESSION_COLUMNS = `id, user_id,
  access_token, access_token_subject, access_token_role, access_token_issued_at, access_token_expiration,
  refresh_token, refresh_token_subject, refresh_token_role, refresh_token_issued_at, refresh_token_expiration`;
