import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { generateId } from '@tollgate/shared';
import { buildServer } from '../server';
import { SUPER_USER, createHarness, seedDocs, type Harness } from './harness';

interface TokenBody {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiresIn: number;
}

describe('HTTP routes', () => {
  let h: Harness;
  let app: FastifyInstance;
  let seed: Awaited<ReturnType<typeof seedDocs>>;

  beforeEach(async () => {
    h = await createHarness();
    seed = await seedDocs(h);
    app = buildServer({
      authzService: h.authzService,
      directoryService: h.directoryService,
      loginRateLimit: { windowMs: 60_000, maxRequests: 5 },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  async function login(loginName: string, password: string, applicationId = seed.application.id) {
    const res = await app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { applicationId, login: loginName, password },
    });
    expect(res.statusCode).toBe(200);
    return res.json<TokenBody>();
  }

  const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok' });
  });

  describe('/auth', () => {
    it('returns a bearer token pair on login', async () => {
      const body = await login('u1', 'correct-pw');
      expect(body.tokenType).toBe('Bearer');
      expect(body.expiresIn).toBe(900);
      expect(body.accessToken.split('.')).toHaveLength(3);
    });

    it('answers bad credentials with 401 and a trace id only', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { applicationId: seed.application.id, login: 'u1', password: 'wrong-pw' },
      });
      expect(res.statusCode).toBe(401);
      const body = res.json<Record<string, unknown>>();
      expect(body.code).toBe('UNAUTHORIZED');
      expect(body.message).toBe('Invalid credentials');
      expect(Object.keys(body).sort()).toEqual(['code', 'message', 'traceId']);
    });

    it('rejects a malformed login body with 422', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { applicationId: 'not-a-uuid', login: 'u1', password: 'pw' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({
        code: 'VALIDATION',
        message: 'Invalid login data',
        issues: [{ path: 'applicationId', message: 'Application id must be a UUID' }],
      });
    });

    it('rejects unparseable JSON with 400', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/login',
        headers: { 'content-type': 'application/json' },
        payload: '{"applicationId":',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'BAD_REQUEST' });
    });

    it('rate limits login attempts per client', async () => {
      const attempt = () =>
        app.inject({
          method: 'POST',
          url: '/auth/login',
          payload: { applicationId: seed.application.id, login: 'u1', password: 'wrong-pw' },
        });
      for (let i = 0; i < 5; i++) {
        expect((await attempt()).statusCode).toBe(401);
      }
      const blocked = await attempt();
      expect(blocked.statusCode).toBe(429);
      expect(blocked.json()).toMatchObject({ code: 'RATE_LIMITED' });
    });

    it('answers an authorize check for a held permission', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const res = await app.inject({
        method: 'POST',
        url: '/auth/authorize',
        headers: bearer(accessToken),
        payload: { permission: 'doc:write' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        allowed: true,
        userId: seed.user.id,
        applicationId: seed.application.id,
      });
    });

    it('answers a denied authorize check with 403', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const res = await app.inject({
        method: 'POST',
        url: '/auth/authorize',
        headers: bearer(accessToken),
        payload: { permission: 'doc:delete' },
      });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toMatchObject({ code: 'FORBIDDEN', message: 'Permission denied' });
    });

    it('requires a bearer header', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/authorize',
        payload: { permission: 'doc:read' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
    });

    it('describes the caller on /auth/me', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(accessToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        userId: seed.user.id,
        applicationId: seed.application.id,
        superUser: false,
        roles: ['editor'],
        permissions: ['doc:read', 'doc:write'],
        expiresAt: '2026-03-01T00:15:00.000Z',
      });
    });

    it('rotates the refresh token', async () => {
      const { refreshToken } = await login('u1', 'correct-pw');
      const first = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refreshToken } });
      expect(first.statusCode).toBe(200);

      const replay = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refreshToken } });
      expect(replay.statusCode).toBe(401);
    });

    it('invalidates the token on logout', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const out = await app.inject({ method: 'POST', url: '/auth/logout', headers: bearer(accessToken) });
      expect(out.statusCode).toBe(204);

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(accessToken) });
      expect(me.statusCode).toBe(401);
      expect(me.json()).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid token' });
    });
  });

  describe('directory', () => {
    it('lets the super-user create an application', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({
        method: 'POST',
        url: '/applications',
        headers: bearer(accessToken),
        payload: { name: 'billing', description: 'Invoices' },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ name: 'billing', description: 'Invoices', enabled: true });
    });

    it('keeps tenant users out of application management', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const res = await app.inject({ method: 'GET', url: '/applications', headers: bearer(accessToken) });
      expect(res.statusCode).toBe(403);

      const remove = await app.inject({
        method: 'DELETE',
        url: `/applications/${seed.application.id}`,
        headers: bearer(accessToken),
      });
      expect(remove.statusCode).toBe(403);
    });

    it('deletes an application together with its users, roles and grants', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const url = `/applications/${seed.application.id}`;

      const removed = await app.inject({ method: 'DELETE', url, headers: bearer(accessToken) });
      expect(removed.statusCode).toBe(204);

      const again = await app.inject({ method: 'DELETE', url, headers: bearer(accessToken) });
      expect(again.statusCode).toBe(404);
      expect(again.json()).toEqual({
        code: 'NOT_FOUND',
        message: 'Application not found',
        entity: 'application',
        id: seed.application.id,
      });

      expect(await h.directoryService.getStats()).toMatchObject({ applications: 0, users: 0, roles: 0, grants: 0 });
      const tenantLogin = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { applicationId: seed.application.id, login: 'u1', password: 'correct-pw' },
      });
      expect(tenantLogin.statusCode).toBe(401);
    });

    it('creates a user without exposing the password digest', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({
        method: 'POST',
        url: `/applications/${seed.application.id}/users`,
        headers: bearer(accessToken),
        payload: { login: 'u2', password: 'another-pw' },
      });
      expect(res.statusCode).toBe(201);
      const body = res.json<Record<string, unknown>>();
      expect(body).toMatchObject({ login: 'u2', applicationId: seed.application.id, enabled: true });
      expect(body).not.toHaveProperty('passwordHash');
    });

    it('changes password and enabled flag in one request', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const url = `/applications/${seed.application.id}/users/${seed.user.id}`;

      const disabled = await app.inject({
        method: 'PATCH',
        url,
        headers: bearer(accessToken),
        payload: { password: 'rotated-pw', enabled: false },
      });
      expect(disabled.statusCode).toBe(200);
      expect(disabled.json()).toMatchObject({ id: seed.user.id, login: 'u1', enabled: false });

      const enabled = await app.inject({
        method: 'PATCH',
        url,
        headers: bearer(accessToken),
        payload: { enabled: true },
      });
      expect(enabled.json()).toMatchObject({ enabled: true });

      await login('u1', 'rotated-pw');
      const stale = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { applicationId: seed.application.id, login: 'u1', password: 'correct-pw' },
      });
      expect(stale.statusCode).toBe(401);
    });

    it('reports an unknown user on update', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const missing = generateId();
      const res = await app.inject({
        method: 'PATCH',
        url: `/applications/${seed.application.id}/users/${missing}`,
        headers: bearer(accessToken),
        payload: { enabled: false },
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'User not found', entity: 'user', id: missing });
    });

    it('checks directory permissions inside the path application', async () => {
      const admin = await h.directoryService.createRole(seed.application.id, {
        name: 'user-admin',
        permissions: ['users:read'],
      });
      await h.directoryService.grantRole(seed.application.id, seed.user.id, admin.id);
      const { accessToken } = await login('u1', 'correct-pw');

      const list = await app.inject({
        method: 'GET',
        url: `/applications/${seed.application.id}/users`,
        headers: bearer(accessToken),
      });
      expect(list.statusCode).toBe(200);
      expect(list.json<Array<{ login: string }>>().map((u) => u.login)).toEqual(['u1']);

      const create = await app.inject({
        method: 'POST',
        url: `/applications/${seed.application.id}/users`,
        headers: bearer(accessToken),
        payload: { login: 'u3', password: 'another-pw' },
      });
      expect(create.statusCode).toBe(403);

      const elsewhere = await app.inject({
        method: 'GET',
        url: `/applications/${generateId()}/users`,
        headers: bearer(accessToken),
      });
      expect(elsewhere.statusCode).toBe(403);
    });

    it('rejects a malformed application id in the path', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({
        method: 'GET',
        url: '/applications/not-a-uuid/roles',
        headers: bearer(accessToken),
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({ code: 'VALIDATION', message: 'Invalid application id' });
    });

    it('reports a duplicate role name as a conflict', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({
        method: 'POST',
        url: `/applications/${seed.application.id}/roles`,
        headers: bearer(accessToken),
        payload: { name: 'editor', permissions: ['doc:read'] },
      });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ code: 'CONFLICT', message: 'Role name is already taken', field: 'name' });
    });

    it('grants and lists roles of a user', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const reader = await h.directoryService.createRole(seed.application.id, {
        name: 'reader',
        permissions: ['doc:read'],
      });
      const url = `/applications/${seed.application.id}/users/${seed.user.id}/roles`;

      const granted = await app.inject({
        method: 'POST',
        url,
        headers: bearer(accessToken),
        payload: { roleId: reader.id },
      });
      expect(granted.statusCode).toBe(201);
      expect(granted.json<Array<{ name: string }>>().map((r) => r.name)).toEqual(['editor', 'reader']);

      const revoked = await app.inject({
        method: 'DELETE',
        url: `${url}/${seed.editor.id}`,
        headers: bearer(accessToken),
      });
      expect(revoked.statusCode).toBe(200);
      expect(revoked.json<Array<{ name: string }>>().map((r) => r.name)).toEqual(['reader']);
    });

    it('returns directory stats to the super-user', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({ method: 'GET', url: '/stats', headers: bearer(accessToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        applications: 1,
        users: 1,
        usersWithoutRoles: 0,
        roles: 1,
        rolesWithoutPermissions: 0,
        grants: 1,
        revokedTokens: 0,
      });
    });
  });

  describe('/version', () => {
    it('reports component versions to the super-user', async () => {
      const { accessToken } = await login(SUPER_USER.login, SUPER_USER.password);
      const res = await app.inject({ method: 'GET', url: '/version', headers: bearer(accessToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ api: '0.1.0', fastify: app.version, node: process.version });
    });

    it('is closed to tenant users', async () => {
      const { accessToken } = await login('u1', 'correct-pw');
      const res = await app.inject({ method: 'GET', url: '/version', headers: bearer(accessToken) });
      expect(res.statusCode).toBe(403);
    });
  });
});
