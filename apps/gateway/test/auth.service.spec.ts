// auth.service.spec.ts
import bcrypt from 'bcryptjs';
import { AuthService } from '@/modules/auth/auth.service';
import {
  AuthenticationFailedError,
  AuthenticationNotFoundError,
  UnexpectedTokenTypeError,
} from '@/modules/auth/auth.errors';
import { TokenUse } from '@/modules/auth/types/token-claims';
import {
  DelegatingPasswordVerifier,
  UNKNOWN_USER_HASH,
} from '@/modules/users/password/password.verifier';
import { ADMIN, createTokenStack, USER } from './support/auth.fixtures';
import { InMemorySessionStore } from './support/in-memory-session.store';
import { InMemoryUsersRepository } from './support/in-memory-users.repository';

describe('AuthService', () => {
  const users = new InMemoryUsersRepository([
    { principal: USER, passwordHash: `{bcrypt}${bcrypt.hashSync('Secret123!', 4)}` },
    { principal: ADMIN, passwordHash: '{noop}Admin123!' },
  ]);
  let store: InMemorySessionStore;
  let stack: ReturnType<typeof createTokenStack>;
  let passwords: DelegatingPasswordVerifier;
  let service: AuthService;

  beforeEach(() => {
    store = new InMemorySessionStore();
    stack = createTokenStack(store);
    passwords = new DelegatingPasswordVerifier();
    service = new AuthService(
      users,
      passwords,
      stack.issuer,
      stack.verifier,
      store,
    );
  });

  describe('authenticate', () => {
    it('issues and stores a verifiable pair for valid credentials', async () => {
      const session = await service.authenticate('user@x.com', 'Secret123!');

      expect(session.userId).toBe(USER.userId);
      const access = await stack.verifier.verifyAccessToken(session.accessToken.token);
      const refresh = await stack.verifier.verifyRefreshToken(session.refreshToken.token);
      expect(access).toMatchObject({ subject: 'user@x.com', role: 'USER', tokenUse: TokenUse.ACCESS });
      expect(refresh).toMatchObject({ subject: 'user@x.com', tokenUse: TokenUse.REFRESH });
      await expect(store.findAll()).resolves.toEqual([session]);
    });

    it('keeps earlier sessions of the same user', async () => {
      const first = await service.authenticate('user@x.com', 'Secret123!');
      await service.authenticate('user@x.com', 'Secret123!');

      await expect(store.findAllByUserId(USER.userId)).resolves.toHaveLength(2);
      await expect(stack.verifier.verifyAccessToken(first.accessToken.token)).resolves.toEqual(
        first.accessToken.claims,
      );
    });

    it.each([
      ['a wrong password', 'user@x.com', 'Wrong123!'],
      ['an unknown username', 'nobody@x.com', 'Secret123!'],
    ])('fails the same way for %s', async (_label, username, password) => {
      const prior = await service.authenticate('user@x.com', 'Secret123!');

      await expect(service.authenticate(username, password)).rejects.toThrow(
        new AuthenticationFailedError(),
      );
      await expect(store.findAll()).resolves.toEqual([prior]);
    });

    it('checks a stand-in hash when the username is unknown', async () => {
      const matches = jest.spyOn(passwords, 'matches');

      await expect(service.authenticate('nobody@x.com', 'Secret123!')).rejects.toBeInstanceOf(
        AuthenticationFailedError,
      );
      expect(matches).toHaveBeenCalledTimes(1);
      expect(matches).toHaveBeenCalledWith('Secret123!', UNKNOWN_USER_HASH);
    });

    it('checks the stored hash of a known username', async () => {
      const matches = jest.spyOn(passwords, 'matches');

      await expect(service.authenticate('user@x.com', 'Wrong123!')).rejects.toBeInstanceOf(
        AuthenticationFailedError,
      );
      expect(matches).toHaveBeenCalledTimes(1);
      expect(matches.mock.calls[0][1]).toMatch(/^\{bcrypt\}\$2[aby]\$04\$/);
    });
  });

  describe('refresh', () => {
    it('rotates: the new pair verifies, the old pair does not', async () => {
      const old = await service.authenticate('user@x.com', 'Secret123!');

      const next = await service.refresh(old.refreshToken.token);

      expect(next.sessionId).not.toBe(old.sessionId);
      expect(next.userId).toBe(USER.userId);
      await expect(stack.verifier.verifyRefreshToken(next.refreshToken.token)).resolves.toEqual(
        next.refreshToken.claims,
      );
      await expect(stack.verifier.verifyAccessToken(next.accessToken.token)).resolves.toEqual(
        next.accessToken.claims,
      );
      await expect(
        stack.verifier.verifyRefreshToken(old.refreshToken.token),
      ).rejects.toBeInstanceOf(AuthenticationNotFoundError);
      await expect(
        stack.verifier.verifyAccessToken(old.accessToken.token),
      ).rejects.toBeInstanceOf(AuthenticationNotFoundError);
      await expect(store.findAll()).resolves.toEqual([next]);
    });

    it('keeps subject and role from the decoded refresh token', async () => {
      const old = await service.authenticate('admin@x.com', 'Admin123!');

      const next = await service.refresh(old.refreshToken.token);

      expect(next.accessToken.claims).toMatchObject({ subject: 'admin@x.com', role: 'ADMIN' });
    });

    it('a refresh token can be used once', async () => {
      const old = await service.authenticate('user@x.com', 'Secret123!');
      await service.refresh(old.refreshToken.token);

      await expect(service.refresh(old.refreshToken.token)).rejects.toBeInstanceOf(
        AuthenticationNotFoundError,
      );
    });

    it('a signed refresh token no session holds: AuthenticationNotFoundError', async () => {
      const orphan = stack.issuer.issueRefreshToken(USER);

      await expect(service.refresh(orphan.token)).rejects.toBeInstanceOf(
        AuthenticationNotFoundError,
      );
      await expect(store.findAll()).resolves.toEqual([]);
    });

    it('an access token is refused: UnexpectedTokenTypeError', async () => {
      const session = await service.authenticate('user@x.com', 'Secret123!');

      await expect(service.refresh(session.accessToken.token)).rejects.toBeInstanceOf(
        UnexpectedTokenTypeError,
      );
    });
  });

  describe('revoke', () => {
    it('kills both tokens of the pair', async () => {
      const session = await service.authenticate('user@x.com', 'Secret123!');

      await service.revoke(session.accessToken.token);

      await expect(store.accessTokenExists(session.accessToken.token)).resolves.toBe(false);
      await expect(store.refreshTokenExists(session.refreshToken.token)).resolves.toBe(false);
      await expect(
        stack.verifier.verifyAccessToken(session.accessToken.token),
      ).rejects.toBeInstanceOf(AuthenticationNotFoundError);
      await expect(
        stack.verifier.verifyRefreshToken(session.refreshToken.token),
      ).rejects.toBeInstanceOf(AuthenticationNotFoundError);
    });

    it('leaves other sessions alone', async () => {
      const a = await service.authenticate('user@x.com', 'Secret123!');
      const b = await service.authenticate('user@x.com', 'Secret123!');

      await service.revoke(a.accessToken.token);

      await expect(store.findAll()).resolves.toEqual([b]);
    });

    it('revoking twice fails the second time', async () => {
      const session = await service.authenticate('user@x.com', 'Secret123!');
      await service.revoke(session.accessToken.token);

      await expect(service.revoke(session.accessToken.token)).rejects.toBeInstanceOf(
        AuthenticationNotFoundError,
      );
    });

    it('a refresh token is refused: UnexpectedTokenTypeError', async () => {
      const session = await service.authenticate('user@x.com', 'Secret123!');

      await expect(service.revoke(session.refreshToken.token)).rejects.toBeInstanceOf(
        UnexpectedTokenTypeError,
      );
    });
  });

  describe('revokeAll', () => {
    it('deletes every session of one user and reports the count', async () => {
      await service.authenticate('user@x.com', 'Secret123!');
      await service.authenticate('user@x.com', 'Secret123!');
      const admin = await service.authenticate('admin@x.com', 'Admin123!');

      await expect(service.revokeAll(USER.userId)).resolves.toBe(2);
      await expect(store.findAll()).resolves.toEqual([admin]);
    });

    it('zero for a user without sessions', async () => {
      await expect(service.revokeAll(USER.userId)).resolves.toBe(0);
    });
  });
});
