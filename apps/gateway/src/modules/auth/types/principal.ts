// src/modules/auth/types/principal.ts
import type { Role } from './role';

/**
 * Authenticated user identity. Immutable once built.
 */
export interface Principal {
  readonly userId: string;
  /** Unique, email-shaped. Becomes the token subject. */
  readonly username: string;
  readonly role: Role;
}

/**
 * What the request context carries after an access token verifies.
 * `authorities` follow the `ROLE_<name>` convention used by the roles guard.
 */
export interface AuthenticatedPrincipal {
  readonly username: string;
  readonly role: Role;
  readonly authorities: readonly string[];
}
