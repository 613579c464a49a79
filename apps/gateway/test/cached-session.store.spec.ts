// cached-session.store.spec.ts
import { CachedSessionStore } from '@/modules/sessions/cached-session.store';
import { TokenPairCache } from '@/modules/sessions/token-pair.cache';
import type { SessionRecord } from '@/modules/auth/types/session-record';
import type { EncodedToken } from '@/modules/auth/types/token-claims';
import { ADMIN, createTokenStack, USER } from './support/auth.fixtures';
import { InMemorySessionStore } from './support/in-memory-session.store';

/** Key set standing in for Redis. */
class FakeTokenPairCache extends TokenPairCache {
  readonly keys = new Set<string>();

  store(record: SessionRecord): Promise<void> {
    this.keys.add(`access:${record.accessToken.token}`);
    this.keys.add(`refresh:${record.refreshToken.token}`);
    return Promise.resolve();
  }

  evict(record: SessionRecord): Promise<void> {
    this.keys.delete(`access:${record.accessToken.token}`);
    this.keys.delete(`refresh:${record.refreshToken.token}`);
    return Promise.resolve();
  }

  accessTokenExists(token: EncodedToken): Promise<boolean> {
    return Promise.resolve(this.keys.has(`access:${token}`));
  }

  refreshTokenExists(token: EncodedToken): Promise<boolean> {
    return Promise.resolve(this.keys.has(`refresh:${token}`));
  }
}

describe('CachedSessionStore', () => {
  let durable: InMemorySessionStore;
  let cache: FakeTokenPairCache;
  let store: CachedSessionStore;
  const { issuer } = createTokenStack(new InMemorySessionStore());

  beforeEach(() => {
    durable = new InMemorySessionStore();
    cache = new FakeTokenPairCache();
    store = new CachedSessionStore(durable, cache);
  });

  it('save: persists durably and caches both tokens', async () => {
    const saved = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });

    await expect(durable.findByAccessToken(saved.accessToken.token)).resolves.toEqual(saved);
    expect(cache.keys.size).toBe(2);
  });

  it('existence checks answer from the cache without touching the durable store', async () => {
    const saved = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
    const durableCheck = jest.spyOn(durable, 'accessTokenExists');

    await expect(store.accessTokenExists(saved.accessToken.token)).resolves.toBe(true);
    expect(durableCheck).not.toHaveBeenCalled();
  });

  it('a cache miss falls back to the durable store', async () => {
    // written behind the cache's back, e.g. before Redis was enabled
    const saved = await durable.save({ userId: USER.userId, ...issuer.issuePair(USER) });

    await expect(store.accessTokenExists(saved.accessToken.token)).resolves.toBe(true);
    await expect(store.refreshTokenExists(saved.refreshToken.token)).resolves.toBe(true);
    await expect(store.refreshTokenExists('unknown')).resolves.toBe(false);
  });

  it('deleteByAccessToken: removes the record and evicts both keys', async () => {
    const saved = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });

    await expect(store.deleteByAccessToken(saved.accessToken.token)).resolves.toEqual(saved);

    expect(cache.keys.size).toBe(0);
    await expect(store.refreshTokenExists(saved.refreshToken.token)).resolves.toBe(false);
  });

  it('deleteAllByUserId: evicts every session of the user only', async () => {
    await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
    await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
    const other = await store.save({ userId: ADMIN.userId, ...issuer.issuePair(ADMIN) });

    await expect(store.deleteAllByUserId(USER.userId)).resolves.toHaveLength(2);

    expect([...cache.keys].sort()).toEqual(
      [`access:${other.accessToken.token}`, `refresh:${other.refreshToken.token}`].sort(),
    );
  });

  it('deleteAllByUserId: evicts a session that lands just before the delete runs', async () => {
    await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
    const durableDelete = durable.deleteAllByUserId.bind(durable);
    let late: SessionRecord | undefined;
    jest.spyOn(durable, 'deleteAllByUserId').mockImplementation(async (userId) => {
      // a concurrent login commits between any lookup and the delete
      late = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
      return durableDelete(userId);
    });
    const lookup = jest.spyOn(durable, 'findAllByUserId');

    const removed = await store.deleteAllByUserId(USER.userId);

    expect(removed).toHaveLength(2);
    expect(removed).toContainEqual(late);
    expect(cache.keys.size).toBe(0);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('deleteByAccessToken: evicts nothing when the durable store removed nothing', async () => {
    const kept = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });
    const evict = jest.spyOn(cache, 'evict');

    await expect(store.deleteByAccessToken('unknown')).resolves.toBeNull();

    expect(evict).not.toHaveBeenCalled();
    await expect(cache.accessTokenExists(kept.accessToken.token)).resolves.toBe(true);
  });

  it('rotate: swaps the cached pair', async () => {
    const old = await store.save({ userId: USER.userId, ...issuer.issuePair(USER) });

    const next = await store.rotate(old.refreshToken.token, {
      userId: USER.userId,
      ...issuer.issuePair(USER),
    });

    await expect(store.refreshTokenExists(old.refreshToken.token)).resolves.toBe(false);
    await expect(store.accessTokenExists(old.accessToken.token)).resolves.toBe(false);
    await expect(cache.refreshTokenExists(next.refreshToken.token)).resolves.toBe(true);
    await expect(durable.findAll()).resolves.toEqual([next]);
  });
});
