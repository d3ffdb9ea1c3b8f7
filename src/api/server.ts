/**
 * HTTP Server - Hono-based REST API
 *
 * Exposes table access, table descriptions and email/password auth over
 * HTTP. Every request to a table runs under the caller's RequestContext,
 * resolved from its bearer token by the auth context middleware.
 *
 * Routes:
 * - GET    /health
 * - POST   /auth/register, /auth/login
 * - GET    /tables, /tables/:table
 * - GET    /rest/:table   (query string = equality filters, `select=a,b` projection)
 * - POST   /rest/:table   (body = row)
 * - PATCH  /rest/:table   (body = changes, query string = filters)
 * - DELETE /rest/:table   (query string = filters)
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import { ClaimsService } from '../auth/jwt.js';
import { SqliteCredentialStore } from '../auth/provider.js';
import type { ClaimsConfig, Clock } from '../auth/types.js';
import type { Fields, ParameterizedStatement } from '../compiler/index.js';
import type { SqliteAdapter } from '../database/sqlite-adapter.js';
import {
  ClaimsError,
  EmptyWriteSetError,
  InvalidColumnSetError,
  InvalidCredentialsError,
  NotFoundError,
  PolicyConflictError,
  PolicyDefinitionError,
  PolicyDeniedError,
  TablegateError,
  type ErrorBody,
} from '../errors/index.js';
import type { HookList } from '../hooks/index.js';
import { authContextMiddleware } from '../middleware/auth-context.js';
import type { AppEnv } from '../middleware/types.js';
import { SchemaCatalog, type TableDescriptor } from '../schema/index.js';
import { HEALTH_ENDPOINT } from '../utils/constants.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { PayloadValue } from '../values/index.js';
import { TableAccessService } from './service.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  readonly db: SqliteAdapter;
  readonly auth: ClaimsConfig;
  readonly logger?: Logger;
  /** Clock for issuing and verifying tokens (default: Date.now) */
  readonly clock?: Clock;
  readonly beforeExecute?: HookList<ParameterizedStatement>;
  readonly cors?: {
    readonly origin?: string | string[];
    readonly credentials?: boolean;
  };
}

const payloadValueSchema: z.ZodType<PayloadValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(payloadValueSchema),
    z.record(payloadValueSchema),
  ])
);

const rowBodySchema = z.record(payloadValueSchema);

const registerBodySchema = z.object({
  email: z.string(),
  password: z.string(),
  confirmPassword: z.string(),
});

const loginBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

/** Query parameter holding the projection; every other parameter is a filter */
const SELECT_PARAM = 'select';

/**
 * Create Hono app instance
 */
export function createServer(config: ServerConfig): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const logger = config.logger ?? silentLogger;

  const claims = new ClaimsService(config.auth, config.clock);
  const credentials = new SqliteCredentialStore(config.db.getDb(), claims);
  const service = new TableAccessService({
    db: config.db,
    catalog: new SchemaCatalog(config.db.getDb()),
    logger,
    ...(config.beforeExecute !== undefined ? { beforeExecute: config.beforeExecute } : {}),
  });

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      const body: ErrorBody = { message: error.message, code: 'INVALID_REQUEST' };
      return c.json(body, error.status);
    }

    if (error instanceof TablegateError) {
      const status = statusFor(error);
      if (status === 500) {
        logger.error(`Request failed: ${error.message}`, { code: error.code, path: c.req.path });
      }
      return c.json(error.toJSON(), status);
    }

    logger.error('Unexpected error', {
      path: c.req.path,
      error: error instanceof Error ? error.message : String(error),
    });
    const body: ErrorBody = { message: 'Internal server error', code: 'INTERNAL_ERROR' };
    return c.json(body, 500);
  });

  if (config.cors !== undefined) {
    app.use('/*', cors({
      origin: config.cors.origin ?? '*',
      credentials: config.cors.credentials ?? false,
    }));
  }

  // Health check and auth endpoints are reachable without a token
  app.get(HEALTH_ENDPOINT, (c) => c.json({ status: 'ok' }));

  app.post('/auth/register', async (c) => {
    const body = await readBody(c, registerBodySchema);

    try {
      const user = await credentials.register(body.email, body.password, body.confirmPassword);
      logger.info('Account registered', { userId: user.id });
      return c.json({ user }, 201);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        return c.json(error.toJSON(), 400);
      }
      throw error;
    }
  });

  app.post('/auth/login', async (c) => {
    const body = await readBody(c, loginBodySchema);
    const session = await credentials.login(body.email, body.password);

    return c.json({
      user: session.user,
      accessToken: session.accessToken,
      tokenType: 'bearer',
      expiresAt: session.claims.expiration,
    });
  });

  app.use('*', authContextMiddleware(claims));

  app.get('/tables', (c) => c.json({ tables: service.listTables() }));

  app.get('/tables/:table', (c) => c.json(publicDescriptor(service.describe(c.req.param('table')))));

  app.get('/rest/:table', async (c) => {
    const { filters, columns } = readQuery(c);
    const rows = await service.select(
      c.req.param('table'),
      { filters, columns },
      c.get('authContext')
    );
    return c.json(rows);
  });

  app.post('/rest/:table', async (c) => {
    const values = await readBody(c, rowBodySchema);
    const rows = await service.insert(c.req.param('table'), values, c.get('authContext'));
    return c.json(rows, 201);
  });

  app.patch('/rest/:table', async (c) => {
    const values = await readBody(c, rowBodySchema);
    const { filters } = readQuery(c);
    const rows = await service.update(c.req.param('table'), values, filters, c.get('authContext'));
    return c.json(rows);
  });

  app.delete('/rest/:table', async (c) => {
    const { filters } = readQuery(c);
    const rows = await service.delete(c.req.param('table'), filters, c.get('authContext'));
    return c.json(rows);
  });

  return app;
}

/**
 * Table description as served over HTTP; policy definitions stay server-side
 */
export interface PublicTableDescriptor {
  readonly name: string;
  readonly schema: string;
  readonly columns: TableDescriptor['columns'];
}

function publicDescriptor(table: TableDescriptor): PublicTableDescriptor {
  return { name: table.name, schema: table.schema, columns: table.columns };
}

/**
 * Status code for an engine error
 */
export function statusFor(error: TablegateError): ContentfulStatusCode {
  if (error instanceof NotFoundError) return 404;
  if (
    error instanceof InvalidColumnSetError ||
    error instanceof EmptyWriteSetError ||
    error instanceof PolicyDefinitionError
  ) {
    return 400;
  }
  if (error instanceof ClaimsError || error instanceof InvalidCredentialsError) return 401;
  if (error instanceof PolicyDeniedError) return 403;
  if (error instanceof PolicyConflictError) return 409;
  return 500;
}

/**
 * Parse and validate a JSON request body
 */
async function readBody<T>(
  c: Context<AppEnv>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new HTTPException(400, { message: 'Invalid JSON in request body' });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new HTTPException(400, {
      message: `Invalid request body: ${parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ')}`,
    });
  }
  return parsed.data;
}

/**
 * Split the query string into equality filters and the projection
 */
function readQuery(c: Context<AppEnv>): { filters: Fields; columns: string[] | undefined } {
  const filters: Record<string, PayloadValue> = {};
  let columns: string[] | undefined;

  for (const [key, value] of Object.entries(c.req.query())) {
    if (key === SELECT_PARAM) {
      columns = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
    } else {
      filters[key] = value;
    }
  }

  return { filters, columns };
}
