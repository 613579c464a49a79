/**
 * Password verification keyed by a stored scheme prefix, e.g.
 *   {bcrypt}$2a$10$...   {argon2}$argon2id$v=19$...   {noop}plain
 * Hashes without a prefix, or with an unknown one, never match.
 */
// src/modules/users/password/password.verifier.ts
import { Logger } from '@nestjs/common';
import * as argon2 from 'argon2';
import bcrypt from 'bcryptjs';
import { randomUUID, timingSafeEqual } from 'node:crypto';

export abstract class PasswordVerifier {
  abstract matches(raw: string, encoded: string): Promise<boolean>;
}

/** One hashing scheme, without the `{id}` prefix. */
export interface PasswordScheme {
  readonly id: string;
  matches(raw: string, hash: string): Promise<boolean>;
}

export const bcryptScheme: PasswordScheme = {
  id: 'bcrypt',
  matches: (raw, hash) => bcrypt.compare(raw, hash),
};

export const argon2Scheme: PasswordScheme = {
  id: 'argon2',
  matches: (raw, hash) => argon2.verify(hash, raw),
};

/** Plain-text storage. Only meant for fixtures and local seeds. */
export const noopScheme: PasswordScheme = {
  id: 'noop',
  matches: (raw, stored) => {
    const a = Buffer.from(raw, 'utf8');
    const b = Buffer.from(stored, 'utf8');
    return Promise.resolve(a.length === b.length && timingSafeEqual(a, b));
  },
};

const PREFIXED = /^\{([a-z0-9_-]+)\}(.*)$/s;

export const BCRYPT_COST = 10;

/**
 * Stand-in hash checked when the username is unknown, so that path costs
 * as much as a wrong password does. Never matches a real user.
 */
export const UNKNOWN_USER_HASH = `{bcrypt}${bcrypt.hashSync(randomUUID(), BCRYPT_COST)}`;

export class DelegatingPasswordVerifier extends PasswordVerifier {
  private readonly logger = new Logger(DelegatingPasswordVerifier.name);
  private readonly schemes: ReadonlyMap<string, PasswordScheme>;

  constructor(schemes: readonly PasswordScheme[] = [bcryptScheme, argon2Scheme, noopScheme]) {
    super();
    this.schemes = new Map(schemes.map((s) => [s.id, s]));
  }

  async matches(raw: string, encoded: string): Promise<boolean> {
    const m = PREFIXED.exec(encoded);
    if (!m) {
      this.logger.warn('Stored password has no {scheme} prefix');
      return false;
    }
    const [, id, hash] = m;
    const scheme = this.schemes.get(id);
    if (!scheme) {
      this.logger.warn(`Unsupported password scheme {${id}}`);
      return false;
    }
    try {
      return await scheme.matches(raw, hash);
    } catch (e: unknown) {
      // malformed hashes count as a mismatch
      this.logger.warn(
        `Password check failed for scheme {${id}}: ${e instanceof Error ? e.message : String(e)}`,
      );
      return false;
    }
  }
}
