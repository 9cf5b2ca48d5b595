import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  postJson,
  loginAs,
  TEST_PASSWORD,
  type TestContext,
} from './test-setup.js';

describe('Auth HTTP API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const res = await ctx.app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    });
  });

  describe('register, login, logout, refresh', () => {
    it('should run the full session lifecycle', async () => {
      const registered = await postJson(ctx.app, '/auth/register', {
        firstName: 'Ada',
        lastName: 'Lovelace',
        email: 'a@x.com',
        password: 'password123',
      });

      expect(registered.status).toBe(201);
      expect(registered.headers.get('Cache-Control')).toBe('no-store');
      const registeredBody: unknown = await registered.json();
      expect(registeredBody).toMatchObject({
        accessToken: expect.any(String),
        refreshToken: expect.any(String),
        expiresIn: 900_000,
        identity: { email: 'a@x.com', handle: 'a', role: 'standard_user', status: 'active' },
      });
      expect(JSON.stringify(registeredBody)).not.toContain('passwordHash');

      const session = await loginAs(ctx.app, 'a@x.com', 'password123');

      const wrongPassword = await postJson(ctx.app, '/auth/login', {
        email: 'a@x.com',
        password: 'password124',
      });
      expect(wrongPassword.status).toBe(401);
      expect(await wrongPassword.json()).toEqual({
        code: 'invalid_credentials',
        message: 'Invalid email or password',
        timestamp: expect.any(String),
      });

      const logout = await postJson(
        ctx.app,
        '/auth/logout',
        { refreshToken: session.refreshToken },
        session.accessToken
      );
      expect(logout.status).toBe(200);
      expect(await logout.json()).toEqual({ message: 'Logged out successfully' });

      const refresh = await postJson(ctx.app, '/auth/refresh', { refreshToken: session.refreshToken });
      expect(refresh.status).toBe(401);
      expect(await refresh.json()).toMatchObject({
        code: 'token_revoked',
        message: 'Refresh token has been revoked',
      });
    });
  });

  describe('POST /auth/login', () => {
    it('should answer an unknown email exactly like a wrong password', async () => {
      const res = await postJson(ctx.app, '/auth/login', {
        email: 'nobody@example.com',
        password: TEST_PASSWORD,
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        code: 'invalid_credentials',
        message: 'Invalid email or password',
      });
    });

    it('should reject a suspended identity', async () => {
      const res = await postJson(ctx.app, '/auth/login', {
        email: 'suspended@example.com',
        password: TEST_PASSWORD,
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        code: 'account_not_active',
        message: 'Account is suspended. Please contact administrator.',
      });
    });

    it('should reject a body without a password', async () => {
      const res = await postJson(ctx.app, '/auth/login', { email: 'admin@example.com' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        code: 'validation_failed',
        message: 'password: Password is required',
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await ctx.app.request('/auth/login', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"email":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'validation_failed' });
    });
  });

  describe('POST /auth/register', () => {
    const registration = {
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      password: 'password123',
    };

    it('should reject a duplicate email with 409', async () => {
      await postJson(ctx.app, '/auth/register', registration);

      const res = await postJson(ctx.app, '/auth/register', registration);

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        code: 'duplicate_resource',
        message: 'Email already registered',
      });
    });

    it('should reject a short password with 400', async () => {
      const res = await postJson(ctx.app, '/auth/register', { ...registration, password: 'short' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        code: 'validation_failed',
        message: 'Password must be at least 8 characters',
      });
    });

    it('should reject a missing first name with 400', async () => {
      const res = await postJson(ctx.app, '/auth/register', { ...registration, firstName: '  ' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        code: 'validation_failed',
        message: 'firstName: First name is required',
      });
    });
  });

  describe('POST /auth/refresh', () => {
    it('should return a new access token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');
      ctx.clock.advance(1_000);

      const res = await postJson(ctx.app, '/auth/refresh', { refreshToken: session.refreshToken });

      expect(res.status).toBe(200);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('Pragma')).toBe('no-cache');
      expect(await res.json()).toEqual({ accessToken: expect.any(String), expiresIn: 900_000 });
    });

    it('should reject an expired refresh token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');
      ctx.clock.advance(86_400_000);

      const res = await postJson(ctx.app, '/auth/refresh', { refreshToken: session.refreshToken });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ code: 'token_expired' });
    });

    it('should reject an unknown refresh token', async () => {
      const res = await postJson(ctx.app, '/auth/refresh', { refreshToken: 'unknown-token' });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ code: 'invalid_token' });
    });
  });

  describe('POST /auth/logout', () => {
    it('should require an access token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');

      const res = await postJson(ctx.app, '/auth/logout', { refreshToken: session.refreshToken });

      expect(res.status).toBe(401);
      expect(res.headers.get('WWW-Authenticate')).toBe('Bearer');
      expect(await res.json()).toMatchObject({ code: 'unauthenticated' });
    });

    it('should not accept a refresh token as the bearer token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');

      const res = await postJson(
        ctx.app,
        '/auth/logout',
        { refreshToken: session.refreshToken },
        session.refreshToken
      );

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ code: 'unauthenticated' });
    });

    it("should refuse to revoke another identity's token", async () => {
      const managerSession = await loginAs(ctx.app, 'manager@example.com');
      const adminSession = await loginAs(ctx.app, 'admin@example.com');

      const res = await postJson(
        ctx.app,
        '/auth/logout',
        { refreshToken: managerSession.refreshToken },
        adminSession.accessToken
      );

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        code: 'token_ownership',
        message: "Cannot revoke another user's token",
      });
    });

    it('should succeed without a refresh token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');

      const res = await postJson(ctx.app, '/auth/logout', {}, session.accessToken);

      expect(res.status).toBe(200);
    });
  });

  describe('POST /auth/session', () => {
    it('should restore the identity behind a refresh token', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');

      const res = await postJson(ctx.app, '/auth/session', { refreshToken: session.refreshToken });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        user: { id: ctx.manager.id, email: 'manager@example.com', role: 'manager' },
      });
    });
  });

  describe('GET /auth/me', () => {
    it('should return the identity and its capabilities', async () => {
      const session = await loginAs(ctx.app, 'manager@example.com');

      const res = await ctx.app.request('/auth/me', {
        headers: { Authorization: `Bearer ${session.accessToken}` },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        user: { id: ctx.manager.id, handle: 'manager' },
        capabilities: ['identities:list', 'profile:read', 'profile:update', 'reports:view'],
      });
    });

    it('should reject an anonymous caller', async () => {
      const res = await ctx.app.request('/auth/me');

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ code: 'unauthenticated' });
    });
  });

  describe('POST /auth/identities/:id/revoke-sessions', () => {
    it('should let an administrator revoke every session of an identity', async () => {
      const managerSession = await loginAs(ctx.app, 'manager@example.com');
      const adminSession = await loginAs(ctx.app, 'admin@example.com');

      const res = await postJson(
        ctx.app,
        `/auth/identities/${ctx.manager.id}/revoke-sessions`,
        {},
        adminSession.accessToken
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ revoked: 1 });

      const refresh = await postJson(ctx.app, '/auth/refresh', {
        refreshToken: managerSession.refreshToken,
      });
      expect(refresh.status).toBe(401);
      expect(await refresh.json()).toMatchObject({ code: 'token_revoked' });
    });

    it('should forbid a non-administrator', async () => {
      const managerSession = await loginAs(ctx.app, 'manager@example.com');

      const res = await postJson(
        ctx.app,
        `/auth/identities/${ctx.admin.id}/revoke-sessions`,
        {},
        managerSession.accessToken
      );

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ code: 'forbidden' });
    });

    it('should report an unknown identity as 404', async () => {
      const adminSession = await loginAs(ctx.app, 'admin@example.com');

      const res = await postJson(
        ctx.app,
        '/auth/identities/missing/revoke-sessions',
        {},
        adminSession.accessToken
      );

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ code: 'not_found' });
    });
  });

  describe('POST /auth/maintenance/sweep', () => {
    it('should delete expired and revoked refresh tokens', async () => {
      const revoked = await loginAs(ctx.app, 'manager@example.com');
      await postJson(ctx.app, '/auth/logout', { refreshToken: revoked.refreshToken }, revoked.accessToken);
      await loginAs(ctx.app, 'manager@example.com');
      const adminSession = await loginAs(ctx.app, 'admin@example.com');

      const res = await postJson(ctx.app, '/auth/maintenance/sweep', {}, adminSession.accessToken);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ expired: 0, revoked: 1 });
    });

    it('should check the manage-settings flag at request time', async () => {
      const managerSession = await loginAs(ctx.app, 'manager@example.com');

      const denied = await postJson(ctx.app, '/auth/maintenance/sweep', {}, managerSession.accessToken);
      expect(denied.status).toBe(403);

      await ctx.storage.identities.save({
        ...ctx.manager,
        permissions: { ...ctx.manager.permissions, manageSettings: true },
      });

      const allowed = await postJson(ctx.app, '/auth/maintenance/sweep', {}, managerSession.accessToken);
      expect(allowed.status).toBe(200);
    });
  });
});
