/**
 * Auth Context Middleware
 *
 * Resolves the caller's RequestContext from the `Authorization` header and
 * stores it on the Hono context as `authContext`.
 *
 * - no header → role: 'anon'
 * - valid bearer token → role: 'authenticated', subject: <token sub>
 * - anything else → the verifier's ClaimsError, handled by the server's error handler
 */

import type { MiddlewareHandler } from 'hono';
import type { ClaimsService } from '../auth/jwt.js';
import type { AppEnv } from './types.js';

export function authContextMiddleware(claims: ClaimsService): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const context = claims.contextFromToken(c.req.header('authorization'));
    c.set('authContext', Object.freeze(context));
    await next();
  };
}
