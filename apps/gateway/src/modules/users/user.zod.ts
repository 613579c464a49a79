// src/modules/users/user.zod.ts
import { z } from 'zod';
import { RoleZ } from '@/modules/auth/types/role';

export const UserSchema = z.object({
  id: z.uuid(),
  username: z.email().max(254),
  password: z.string().min(1),
  role: RoleZ,
});
