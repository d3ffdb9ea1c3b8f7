/**
 * Middleware Type Definitions
 */

import type { RequestContext } from '../auth/types.js';

/**
 * Hono environment shared by the server and its middleware
 */
export type AppEnv = {
  Variables: {
    /** Set by the auth context middleware on every request */
    authContext: RequestContext;
  };
};
