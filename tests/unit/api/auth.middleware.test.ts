/**
 * Auth Middleware Unit Tests
 * Tests for ActorContext construction from a bearer token
 */

import { Hono } from 'hono';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';

import { createAuthMiddleware, createPublicMiddleware } from '@/api/middleware/auth.js';
import type { TokenVerifier } from '@/api/middleware/auth.js';

describe('Auth Middleware', () => {
  let app: Hono;
  let verifyToken: Mock<TokenVerifier>;

  beforeEach(() => {
    verifyToken = vi.fn<TokenVerifier>();
    app = new Hono();
    app.use('*', createAuthMiddleware({ verifyToken }));
    app.get('/test', (c) => c.json({ actor: c.get('actor'), requestId: c.get('requestId') }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Token Extraction', () => {
    it('should return 401 when Authorization header is missing', async () => {
      const res = await app.request('/test');

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid authorization header',
        },
      });
      expect(verifyToken).not.toHaveBeenCalled();
    });

    it('should return 401 when Authorization header is not Bearer', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Basic abc123' },
      });

      expect(res.status).toBe(401);
    });

    it('should return 401 when Bearer token is empty', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer   ' },
      });

      expect(res.status).toBe(401);
      expect(verifyToken).not.toHaveBeenCalled();
    });
  });

  describe('Token Verification', () => {
    it('should return 401 when the token is rejected', async () => {
      verifyToken.mockResolvedValue(null);

      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer test-token' },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        error: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
      });
      expect(verifyToken).toHaveBeenCalledWith('test-token');
    });

    it('should return 500 when verification throws', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      verifyToken.mockRejectedValue(new Error('auth service down'));

      const res = await app.request('/test', {
        headers: { Authorization: 'Bearer test-token' },
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({
        error: { code: 'INTERNAL_ERROR', message: 'Authentication failed' },
      });
    });
  });

  describe('ActorContext', () => {
    it('should attach the verified user with request metadata', async () => {
      verifyToken.mockResolvedValue({ userId: 'u-staff' });

      const res = await app.request('/test', {
        headers: {
          Authorization: 'Bearer test-token',
          'x-forwarded-for': '10.0.0.7',
          'user-agent': 'vitest',
        },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        actor: {
          type: 'user',
          userId: 'u-staff',
          requestId: expect.any(String),
          ip: '10.0.0.7',
          userAgent: 'vitest',
        },
        requestId: expect.any(String),
      });
    });
  });
});

describe('Public Middleware', () => {
  it('should assign a request id without checking credentials', async () => {
    const app = new Hono();
    app.use('*', createPublicMiddleware());
    app.get('/open', (c) => c.json({ requestId: c.get('requestId') }));

    const res = await app.request('/open');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ requestId: expect.any(String) });
  });
});
