import { describe, it, expect, beforeEach } from 'vitest';
import { AuthzError, type TokenPair } from '@tollgate/domain';
import { generateId } from '@tollgate/shared';
import {
  ACCESS_TTL,
  KEY_ONE,
  KEY_TWO,
  REFRESH_TTL,
  SUPER_USER,
  createHarness,
  seedDocs,
  type Harness,
} from './harness';

function kindOf(err: unknown): string {
  return err instanceof AuthzError ? err.kind : 'not-an-authz-error';
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to fail');
}

describe('authorization flow', () => {
  let h: Harness;
  let seed: Awaited<ReturnType<typeof seedDocs>>;
  let pair: TokenPair;

  beforeEach(async () => {
    h = await createHarness();
    seed = await seedDocs(h);
    pair = await h.authzService.login({
      applicationId: seed.application.id,
      login: 'u1',
      password: 'correct-pw',
    });
  });

  describe('login and authorize', () => {
    it('allows a permission held through a granted role', async () => {
      const claims = await h.authzService.authorize(pair.accessToken, 'doc:write');
      expect(claims.sub).toBe(seed.user.id);
      expect(claims.app).toBe(seed.application.id);
      expect(claims.roles).toEqual(['editor']);
      expect(pair.expiresIn).toBe(ACCESS_TTL);
    });

    it('denies a permission no role carries', async () => {
      const err = await failure(h.authzService.authorize(pair.accessToken, 'doc:delete'));
      expect(kindOf(err)).toBe('PERMISSION_DENIED');
    });

    it('denies access to another application', async () => {
      const other = await h.directoryService.createApplication({ name: 'billing' });
      const err = await failure(h.authzService.authorize(pair.accessToken, 'doc:read', other.id));
      expect(kindOf(err)).toBe('PERMISSION_DENIED');
    });

    it('fails a wrong password and an unknown login the same way', async () => {
      const wrongPassword = await failure(
        h.authzService.login({ applicationId: seed.application.id, login: 'u1', password: 'wrong-pw' }),
      );
      const unknownLogin = await failure(
        h.authzService.login({ applicationId: seed.application.id, login: 'nobody', password: 'correct-pw' }),
      );

      for (const err of [wrongPassword, unknownLogin]) {
        expect(err).toBeInstanceOf(AuthzError);
        if (!(err instanceof AuthzError)) continue;
        expect(err.kind).toBe('INVALID_CREDENTIALS');
        expect(err.message).toBe('Invalid credentials');
        expect(Object.keys(err.safeMeta)).toEqual(['traceId']);
      }
    });

    it('rejects login into an unknown application', async () => {
      const err = await failure(
        h.authzService.login({ applicationId: generateId(), login: 'u1', password: 'correct-pw' }),
      );
      expect(kindOf(err)).toBe('INVALID_CREDENTIALS');
    });
  });

  describe('super-user', () => {
    it('is allowed everything in any application without grants', async () => {
      const anyApp = generateId();
      const su = await h.authzService.login({
        applicationId: anyApp,
        login: SUPER_USER.login,
        password: SUPER_USER.password,
      });

      await expect(h.authzService.authorize(su.accessToken, 'anything:whatsoever')).resolves.toMatchObject({
        app: anyApp,
      });
      await expect(
        h.authzService.authorize(su.accessToken, 'doc:delete', seed.application.id),
      ).resolves.toMatchObject({ app: anyApp });
    });

    it('rejects a wrong super-user password', async () => {
      const err = await failure(
        h.authzService.login({
          applicationId: seed.application.id,
          login: SUPER_USER.login,
          password: 'not-the-password',
        }),
      );
      expect(kindOf(err)).toBe('INVALID_CREDENTIALS');
    });
  });

  describe('expiry', () => {
    it('accepts the access token one second before expiry', async () => {
      h.clock.advance(ACCESS_TTL - 1);
      await expect(h.authzService.authorize(pair.accessToken, 'doc:read')).resolves.toMatchObject({
        sub: seed.user.id,
      });
    });

    it('rejects the access token at the exact expiry second', async () => {
      h.clock.advance(ACCESS_TTL);
      const err = await failure(h.authzService.authorize(pair.accessToken, 'doc:read'));
      expect(kindOf(err)).toBe('TOKEN_INVALID');
    });

    it('rejects a refresh token once its own ttl has passed', async () => {
      h.clock.advance(REFRESH_TTL);
      const err = await failure(h.authzService.refresh(pair.refreshToken));
      expect(kindOf(err)).toBe('TOKEN_INVALID');
    });
  });

  describe('refresh', () => {
    it('issues a working pair and rotates the refresh token', async () => {
      h.clock.advance(60);
      const next = await h.authzService.refresh(pair.refreshToken);

      await expect(h.authzService.authorize(next.accessToken, 'doc:write')).resolves.toMatchObject({
        sub: seed.user.id,
      });
      const replay = await failure(h.authzService.refresh(pair.refreshToken));
      expect(kindOf(replay)).toBe('TOKEN_INVALID');
      await expect(h.authzService.refresh(next.refreshToken)).resolves.toMatchObject({ expiresIn: ACCESS_TTL });
    });

    it('lets only one of two concurrent uses of a refresh token win', async () => {
      const results = await Promise.allSettled([
        h.authzService.refresh(pair.refreshToken),
        h.authzService.refresh(pair.refreshToken),
      ]);
      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
    });

    it('refuses an access token where a refresh token is expected', async () => {
      const err = await failure(h.authzService.refresh(pair.accessToken));
      expect(kindOf(err)).toBe('TOKEN_INVALID');
    });

    it('picks up role changes in the new access token', async () => {
      const reader = await h.directoryService.createRole(seed.application.id, {
        name: 'reader',
        permissions: ['doc:read'],
      });
      await h.directoryService.grantRole(seed.application.id, seed.user.id, reader.id);

      const next = await h.authzService.refresh(pair.refreshToken);
      const { claims } = await h.authzService.inspect(next.accessToken);
      expect(claims.roles).toEqual(['editor', 'reader']);
    });

    it('rejects refresh for a disabled user', async () => {
      await h.directoryService.updateUser(seed.application.id, seed.user.id, { enabled: false });
      const err = await failure(h.authzService.refresh(pair.refreshToken));
      expect(kindOf(err)).toBe('TOKEN_INVALID');
    });
  });

  describe('logout', () => {
    it('revokes the access token and its paired refresh token', async () => {
      await h.authzService.logout(pair.accessToken);

      expect(kindOf(await failure(h.authzService.authorize(pair.accessToken, 'doc:read')))).toBe(
        'TOKEN_INVALID',
      );
      expect(kindOf(await failure(h.authzService.refresh(pair.refreshToken)))).toBe('TOKEN_INVALID');
    });

    it('leaves revocation rows until both tokens expire, then prunes them', async () => {
      await h.authzService.logout(pair.accessToken);

      h.clock.advance(ACCESS_TTL);
      expect(await h.authzService.pruneRevokedTokens()).toBe(1);

      h.clock.advance(REFRESH_TTL - ACCESS_TTL);
      expect(await h.authzService.pruneRevokedTokens()).toBe(1);
      expect((await h.directoryService.getStats()).revokedTokens).toBe(0);
    });
  });

  describe('directory changes', () => {
    it('takes a revoked grant away on the next check', async () => {
      await h.directoryService.revokeRole(seed.application.id, seed.user.id, seed.editor.id);
      const err = await failure(h.authzService.authorize(pair.accessToken, 'doc:write'));
      expect(kindOf(err)).toBe('PERMISSION_DENIED');
    });

    it('sees permission edits on the next check with the cache enabled', async () => {
      const cached = await createHarness({ permissionCache: true });
      const docs = await seedDocs(cached);
      const tokens = await cached.authzService.login({
        applicationId: docs.application.id,
        login: 'u1',
        password: 'correct-pw',
      });
      await cached.authzService.authorize(tokens.accessToken, 'doc:write');

      await cached.directoryService.updateRole(docs.application.id, docs.editor.id, {
        permissions: ['doc:read'],
      });

      const err = await failure(cached.authzService.authorize(tokens.accessToken, 'doc:write'));
      expect(kindOf(err)).toBe('PERMISSION_DENIED');
      await expect(cached.authzService.authorize(tokens.accessToken, 'doc:read')).resolves.toMatchObject({
        sub: docs.user.id,
      });
    });

    it('blocks login once the application is disabled', async () => {
      await h.directoryService.updateApplication(seed.application.id, { enabled: false });
      const err = await failure(
        h.authzService.login({ applicationId: seed.application.id, login: 'u1', password: 'correct-pw' }),
      );
      expect(kindOf(err)).toBe('INVALID_CREDENTIALS');
    });
  });

  describe('key rotation', () => {
    it('keeps verifying tokens from a retired active key while it stays in the ring', async () => {
      h.signer.rotateKeys({ activeKid: KEY_TWO.kid, keys: [KEY_TWO, KEY_ONE] });
      await expect(h.authzService.authorize(pair.accessToken, 'doc:read')).resolves.toMatchObject({
        sub: seed.user.id,
      });

      h.signer.rotateKeys({ activeKid: KEY_TWO.kid, keys: [KEY_TWO] });
      const err = await failure(h.authzService.authorize(pair.accessToken, 'doc:read'));
      expect(kindOf(err)).toBe('TOKEN_INVALID');
    });
  });
});
