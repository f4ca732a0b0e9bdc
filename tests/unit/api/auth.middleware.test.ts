/**
 * Auth Middleware Unit Tests
 * Tests for ActorContext construction from a bearer token
 */

import { AuthError, createClient } from '@supabase/supabase-js';
import { Hono } from 'hono';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  createAuthMiddleware,
  createPublicMiddleware,
  createSupabaseTokenVerifier,
} from '@/api/middleware/auth.js';

describe('Auth Middleware', () => {
  let app: Hono;
  let verifyToken: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    verifyToken = vi.fn();
    app = new Hono();
    app.use('*', createAuthMiddleware({ verifyToken }));
    app.get('/test', (c) => c.json({ actor: c.get('actor'), requestId: c.get('requestId') }));
  });

  describe('Token Extraction', () => {
    it('should return 401 when Authorization header is missing', async () => {
      const res = await app.request('/test');

      expect(res.status).toBe(401);
      const body = await res.json();
      expect(body.error.code).toBe('UNAUTHORIZED');
      expect(body.error.message).toBe('Missing or invalid authorization header');
      expect(verifyToken).not.toHaveBeenCalled();
    });

    it('should return 401 when Authorization header is not Bearer', async () => {
      const res = await app.request('/test', {
        headers: { Authorization: 'Basic dXNlcjpwYXNz' },
      });

      expect(res.status).toBe(401);
    });

    it('should return 401 for an empty bearer token', async () => {
      const res = await app.request('/test', { headers: { Authorization: 'Bearer   ' } });

      expect(res.status).toBe(401);
      expect(verifyToken).not.toHaveBeenCalled();
    });

    it('should return 401 when the token does not verify', async () => {
      verifyToken.mockResolvedValue(null);

      const res = await app.request('/test', { headers: { Authorization: 'Bearer expired' } });

      expect(res.status).toBe(401);
      const body = await res.json();
      expect(body.error.message).toBe('Invalid or expired token');
      expect(verifyToken).toHaveBeenCalledWith('expired');
    });
  });

  describe('ActorContext Construction', () => {
    it('should build a user actor from the verified permissions', async () => {
      verifyToken.mockResolvedValue({
        id: 'agent_1',
        permissions: ['knowledge:read', 'cases:write'],
      });

      const res = await app.request('/test', {
        headers: {
          Authorization: 'Bearer test-token',
          'user-agent': 'vitest',
          'x-forwarded-for': '203.0.113.7',
        },
      });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.actor).toEqual({
        type: 'user',
        userId: 'agent_1',
        requestId: body.requestId,
        permissions: ['knowledge:read', 'cases:write'],
        ip: '203.0.113.7',
        userAgent: 'vitest',
      });
      expect(typeof body.requestId).toBe('string');
    });

    it('should mark wildcard holders as admin', async () => {
      verifyToken.mockResolvedValue({ id: 'owner_1', permissions: ['*'] });

      const res = await app.request('/test', { headers: { Authorization: 'Bearer test-token' } });

      const body = await res.json();
      expect(body.actor.type).toBe('admin');
    });

    it('should return 500 when verification throws', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      verifyToken.mockRejectedValue(new Error('auth server down'));

      const res = await app.request('/test', { headers: { Authorization: 'Bearer test-token' } });

      expect(res.status).toBe(500);
      const body = await res.json();
      expect(body.error).toMatchObject({
        code: 'INTERNAL_ERROR',
        message: 'Authentication failed',
      });
    });
  });

  describe('Public Middleware', () => {
    it('should attach an anonymous actor', async () => {
      const publicApp = new Hono();
      publicApp.use('*', createPublicMiddleware());
      publicApp.get('/test', (c) => c.json(c.get('actor')));

      const res = await publicApp.request('/test');

      const body = await res.json();
      expect(body.type).toBe('anonymous');
      expect(body.permissions).toEqual([]);
    });
  });
});

describe('createSupabaseTokenVerifier', () => {
  function client() {
    return createClient('http://localhost:54321', 'test-service-key', {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  it('should read permissions from app_metadata', async () => {
    const supabase = client();
    vi.spyOn(supabase.auth, 'getUser').mockResolvedValue({
      data: {
        user: {
          id: 'reviewer_1',
          aud: 'authenticated',
          created_at: '2026-01-01T00:00:00.000Z',
          app_metadata: { provider: 'email', permissions: ['knowledge:review'] },
          user_metadata: {},
        },
      },
      error: null,
    });

    const user = await createSupabaseTokenVerifier(supabase)('test-token');

    expect(user).toEqual({ id: 'reviewer_1', permissions: ['knowledge:review'] });
    expect(supabase.auth.getUser).toHaveBeenCalledWith('test-token');
  });

  it('should grant nothing when app_metadata has no usable permissions', async () => {
    const supabase = client();
    vi.spyOn(supabase.auth, 'getUser').mockResolvedValue({
      data: {
        user: {
          id: 'user_2',
          aud: 'authenticated',
          created_at: '2026-01-01T00:00:00.000Z',
          app_metadata: { permissions: 'knowledge:read' },
          user_metadata: {},
        },
      },
      error: null,
    });

    const user = await createSupabaseTokenVerifier(supabase)('test-token');

    expect(user).toEqual({ id: 'user_2', permissions: [] });
  });

  it('should return null for a rejected token', async () => {
    const supabase = client();
    vi.spyOn(supabase.auth, 'getUser').mockResolvedValue({
      data: { user: null },
      error: new AuthError('invalid JWT', 401),
    });

    await expect(createSupabaseTokenVerifier(supabase)('bad-token')).resolves.toBeNull();
  });
});
