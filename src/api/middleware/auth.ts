/**
 * Auth Middleware
 * Constructs ActorContext from a relayer key or a Supabase JWT
 *
 * - X-Relayer-Key matching a configured key → relayer actor
 * - Authorization: Bearer <Supabase JWT> → subscriber actor, acting for
 *   the wallet in user_metadata.wallet_address
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { keccak256, toBytes } from 'viem';

import { normalizeAddress } from '@/lib/address.js';
import type { ActorContext } from '@/types/index.js';
import { RELAYER_PERMISSIONS } from '@/types/index.js';

/**
 * The part of the Supabase client the middleware uses
 */
export interface TokenVerifier {
  auth: {
    getUser(jwt?: string): Promise<{
      data: {
        user: { id: string; user_metadata?: Record<string, unknown> } | null;
      };
      error: { message: string } | null;
    }>;
  };
}

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  supabaseClient: TokenVerifier;
  relayerApiKeys: string[];
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Short stable id for a relayer key; the key itself never leaves this module
 */
export function relayerKeyId(key: string): string {
  return keccak256(toBytes(key)).slice(2, 18);
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

function clientInfo(c: Context): { ip?: string; userAgent?: string } {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;
  const relayerKeys = new Set(deps.relayerApiKeys);

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Relayer key
    const relayerKey = c.req.header('X-Relayer-Key');
    if (relayerKey !== undefined) {
      if (!relayerKeys.has(relayerKey)) {
        return unauthorized(c, 'Invalid relayer key', requestId);
      }
      const actor: ActorContext = {
        type: 'relayer',
        requestId,
        permissions: [...RELAYER_PERMISSIONS],
        keyId: relayerKeyId(relayerKey),
        ...clientInfo(c),
      };
      c.set('actor', actor);
      c.set('requestId', requestId);
      return next();
    }

    // 2. Subscriber JWT
    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    const token = authHeader.slice(7).trim();
    if (token === '') {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    try {
      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error !== null || user === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      const wallet = user.user_metadata?.wallet_address;
      const address = typeof wallet === 'string' ? normalizeAddress(wallet) : null;

      const actor: ActorContext = {
        type: 'subscriber',
        userId: user.id,
        requestId,
        permissions: [],
        ...(address !== null && { address }),
        ...clientInfo(c),
      };

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

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
      ...clientInfo(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
