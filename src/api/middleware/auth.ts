/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase JWT
 *
 * Permissions are granted per user in Supabase `app_metadata.permissions`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { ActorContext } from '@/types/index.js';

/**
 * User identity resolved from a bearer token
 */
export interface AuthenticatedUser {
  id: string;
  permissions: string[];
}

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  /** Returns null when the token is invalid or expired */
  verifyToken: (token: string) => Promise<AuthenticatedUser | null>;
}

const appMetadataSchema = z
  .object({
    permissions: z.array(z.string()).default([]),
  })
  .passthrough();

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Check if user has admin-level permissions
 */
function isAdmin(permissions: string[]): boolean {
  return permissions.some((p) => p === '*' || p.startsWith('admin:'));
}

function unauthorized(c: Context, message: string, requestId: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Verify tokens against Supabase Auth
 */
export function createSupabaseTokenVerifier(
  supabaseClient: SupabaseClient
): AuthMiddlewareDeps['verifyToken'] {
  return async (token: string) => {
    const {
      data: { user },
      error,
    } = await supabaseClient.auth.getUser(token);

    if (error || !user) {
      return null;
    }

    const metadata = appMetadataSchema.safeParse(user.app_metadata);
    return {
      id: user.id,
      permissions: metadata.success ? metadata.data.permissions : [],
    };
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies it, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { verifyToken } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    try {
      // 2. Verify JWT
      const user = await verifyToken(token);
      if (user === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      // 3. Construct ActorContext
      const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
      const userAgent = c.req.header('user-agent');

      const actor: ActorContext = {
        type: isAdmin(user.permissions) ? 'admin' : 'user',
        userId: user.id,
        requestId,
        permissions: user.permissions,
        ...(ip !== undefined && { ip }),
        ...(userAgent !== undefined && { userAgent }),
      };

      // 4. Attach to context
      c.set('actor', actor);
      c.set('requestId', requestId);

      return next();
    } catch (err) {
      console.error('Auth middleware error:', err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
    const userAgent = c.req.header('user-agent');

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
      ...(ip !== undefined && { ip }),
      ...(userAgent !== undefined && { userAgent }),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
