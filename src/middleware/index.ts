/**
 * Middleware Module
 *
 * HTTP middleware attaching the request's auth context.
 */

export { authContextMiddleware } from './auth-context.js';

export type { AppEnv } from './types.js';
