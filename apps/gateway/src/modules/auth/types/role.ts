// src/modules/auth/types/role.ts
import { z } from 'zod';

/**
 * Closed set of roles carried in the `role` claim.
 */
export enum Role {
  USER = 'USER',
  ADMIN = 'ADMIN',
}

export const RoleZ = z.enum(Role);

/** Narrow an arbitrary string to a Role, or null when it is not one. */
export function parseRole(value: unknown): Role | null {
  const parsed = RoleZ.safeParse(value);
  return parsed.success ? parsed.data : null;
}
