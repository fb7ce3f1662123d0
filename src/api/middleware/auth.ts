/**
 * Auth Middleware
 * Constructs ActorContext from a verified bearer token
 *
 * Token validation happens in the identity provider (Supabase Auth); this
 * middleware only turns its answer into an ActorContext.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext } from '@/types/index.js';

/**
 * Resolves a bearer token to a user id, or null when it is not valid
 */
export type TokenVerifier = (token: string) => Promise<{ userId: string } | null>;

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  verifyToken: TokenVerifier;
}

/**
 * Verify JWTs against Supabase Auth
 */
export function createSupabaseTokenVerifier(
  supabaseClient: SupabaseClient
): TokenVerifier {
  return async (token: string) => {
    const {
      data: { user },
      error,
    } = await supabaseClient.auth.getUser(token);

    if (error !== null || user === null) {
      return null;
    }
    return { userId: user.id };
  };
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
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
 * Create auth middleware for protected routes
 * Extracts the bearer token, verifies it, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps): MiddlewareHandler {
  const { verifyToken } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token = authHeader?.startsWith('Bearer ') === true
      ? authHeader.slice(7).trim()
      : '';

    if (token === '') {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    try {
      // 2. Verify token
      const verified = await verifyToken(token);
      if (verified === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      // 3. Construct ActorContext
      const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
      const userAgent = c.req.header('user-agent');

      const actor: ActorContext = {
        type: 'user',
        userId: verified.userId,
        requestId,
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
 * Middleware for routes that don't require auth
 * Only assigns a request id
 */
export function createPublicMiddleware(): MiddlewareHandler {
  return function publicMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    return next();
  };
}
