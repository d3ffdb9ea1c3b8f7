/**
 * HTTP Server Tests
 *
 * Drives the Hono app in process through `app.request()`.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { z } from 'zod';
import { createServer, statusFor } from '../../src/api/server.js';
import { ClaimsService } from '../../src/auth/jwt.js';
import { SqliteAdapter } from '../../src/database/sqlite-adapter.js';
import {
  CatalogError,
  PolicyConflictError,
  PolicyDeniedError,
  TokenExpiredError,
} from '../../src/errors/index.js';
import type { AppEnv } from '../../src/middleware/types.js';
import { SqlitePolicyStore } from '../../src/rls/storage.js';
import { createTestDatabase, type TestDatabase } from '../fixtures/test-db.js';
import { TEST_CLAIMS_CONFIG, TEST_NOW_MS, fixedClock } from '../helpers/jwt.js';

const loginResponseSchema = z.object({
  user: z.object({ id: z.string(), email: z.string() }),
  accessToken: z.string(),
  tokenType: z.literal('bearer'),
  expiresAt: z.number(),
});

const descriptorSchema = z.object({
  name: z.string(),
  schema: z.string(),
  columns: z.array(z.object({ name: z.string() })),
});

function jsonRequest(method: string, body: string, token?: string): RequestInit {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token !== undefined) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  return { method, headers, body };
}

describe('HTTP server', () => {
  let testDb: TestDatabase;
  let app: Hono<AppEnv>;
  let store: SqlitePolicyStore;
  const claims = new ClaimsService(TEST_CLAIMS_CONFIG, fixedClock());
  const tokenFor = (subject: string) => claims.sign(claims.issue(subject));

  beforeEach(() => {
    testDb = createTestDatabase();
    app = createServer({
      db: new SqliteAdapter(testDb.db),
      auth: TEST_CLAIMS_CONFIG,
      clock: fixedClock(),
    });
    store = new SqlitePolicyStore(testDb.db);
  });

  afterEach(() => {
    testDb.close();
  });

  test('GET /health', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  describe('auth routes', () => {
    const credentials = JSON.stringify({
      email: 'Alice@Example.com',
      password: 'password123',
      confirmPassword: 'password123',
    });

    test('registers an account', async () => {
      const res = await app.request('/auth/register', jsonRequest('POST', credentials));

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ user: { email: 'alice@example.com' } });
    });

    test('rejects mismatched passwords', async () => {
      const res = await app.request(
        '/auth/register',
        jsonRequest('POST', JSON.stringify({
          email: 'alice@example.com',
          password: 'password123',
          confirmPassword: 'password124',
        }))
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        message: 'Passwords do not match',
        code: 'INVALID_CREDENTIALS',
      });
    });

    test('rejects bodies missing fields', async () => {
      const res = await app.request(
        '/auth/register',
        jsonRequest('POST', JSON.stringify({ email: 'alice@example.com' }))
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        message: 'Invalid request body: password, confirmPassword',
        code: 'INVALID_REQUEST',
      });
    });

    test('logs in and returns a bearer token', async () => {
      await app.request('/auth/register', jsonRequest('POST', credentials));

      const res = await app.request(
        '/auth/login',
        jsonRequest('POST', JSON.stringify({ email: 'alice@example.com', password: 'password123' }))
      );

      expect(res.status).toBe(200);
      const body = loginResponseSchema.parse(await res.json());
      expect(body.user.email).toBe('alice@example.com');
      expect(body.expiresAt).toBe(TEST_NOW_MS / 1000 + 3600);
      expect(claims.verify(body.accessToken).subject).toBe(body.user.id);
    });

    test('rejects a wrong password', async () => {
      await app.request('/auth/register', jsonRequest('POST', credentials));

      const res = await app.request(
        '/auth/login',
        jsonRequest('POST', JSON.stringify({ email: 'alice@example.com', password: 'wrong-password' }))
      );

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ message: 'Invalid credentials', code: 'INVALID_CREDENTIALS' });
    });
  });

  describe('table routes', () => {
    test('GET /tables lists user tables only', async () => {
      const res = await app.request('/tables');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        tables: ['items', 'memberships', 'notes', 'roles', 'users'],
      });
    });

    test('GET /tables/:table describes a table', async () => {
      const res = await app.request('/tables/notes');

      expect(res.status).toBe(200);
      const body = descriptorSchema.parse(await res.json());
      expect(body.name).toBe('notes');
      expect(body.schema).toBe('main');
      expect(body.columns.map((c) => c.name)).toEqual(['id', 'owner_id', 'title', 'meta', 'published']);
    });

    test('does not reveal policy definitions', async () => {
      await store.execute("CREATE POLICY notes_admin ON notes USING (owner_id = 'admin-7')");

      const res = await app.request('/tables/notes');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).not.toHaveProperty('policies');
      expect(JSON.stringify(body)).not.toContain('admin-7');
    });

    test('hides engine tables', async () => {
      const res = await app.request('/tables/_policies');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        message: "Table '_policies' not found",
        code: 'NOT_FOUND',
        details: { table: '_policies' },
      });
    });
  });

  describe('rest routes', () => {
    beforeEach(async () => {
      await store.execute('CREATE POLICY notes_public_read ON notes FOR SELECT USING (published = 1)');
      await store.execute('CREATE POLICY notes_owner ON notes USING (owner_id = auth.uid())');
    });

    test('anonymous reads see published rows', async () => {
      const res = await app.request('/rest/notes?select=id,title');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([
        { id: 1, title: 'A1' },
        { id: 3, title: 'B1' },
      ]);
    });

    test('bearer tokens widen reads to owned rows', async () => {
      const res = await app.request('/rest/notes?select=id&owner_id=user-a', {
        headers: { Authorization: `Bearer ${tokenFor('user-a')}` },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([{ id: 1 }, { id: 2 }]);
    });

    test('POST inserts an owned row', async () => {
      const res = await app.request(
        '/rest/notes',
        jsonRequest('POST', JSON.stringify({ id: 4, owner_id: 'user-a', title: 'A3' }), tokenFor('user-a'))
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual([
        { id: 4, owner_id: 'user-a', title: 'A3', meta: null, published: 0 },
      ]);
    });

    test('POST rejects rows failing the check', async () => {
      const res = await app.request(
        '/rest/notes',
        jsonRequest('POST', JSON.stringify({ id: 4, title: 'anon' }))
      );

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        message: 'write rejected by access policy',
        code: 'POLICY_DENIED',
      });
    });

    test('registered users act as their own subject', async () => {
      await app.request('/auth/register', jsonRequest('POST', JSON.stringify({
        email: 'bob@example.com',
        password: 'password123',
        confirmPassword: 'password123',
      })));
      const login = await app.request(
        '/auth/login',
        jsonRequest('POST', JSON.stringify({ email: 'bob@example.com', password: 'password123' }))
      );
      const session = loginResponseSchema.parse(await login.json());

      const res = await app.request(
        '/rest/notes',
        jsonRequest('POST', JSON.stringify({ id: 4, owner_id: session.user.id, title: 'mine' }), session.accessToken)
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual([
        { id: 4, owner_id: session.user.id, title: 'mine', meta: null, published: 0 },
      ]);
    });

    test('PATCH updates visible rows matching the query', async () => {
      const res = await app.request(
        '/rest/notes?id=2',
        jsonRequest('PATCH', JSON.stringify({ title: 'A2!' }), tokenFor('user-a'))
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([
        { id: 2, owner_id: 'user-a', title: 'A2!', meta: null, published: 0 },
      ]);
    });

    test('DELETE removes nothing for anonymous callers', async () => {
      const res = await app.request('/rest/notes', { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });

    test('reports unknown tables', async () => {
      const res = await app.request('/rest/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        message: "Table 'missing' not found",
        code: 'NOT_FOUND',
        details: { table: 'missing' },
      });
    });

    test('reports unknown columns', async () => {
      const res = await app.request('/rest/notes?nope=1');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        message: "Invalid columns for table 'notes': nope",
        code: 'INVALID_COLUMN_SET',
        details: { columns: ['nope'] },
      });
    });

    test('reports empty writes', async () => {
      const res = await app.request('/rest/notes', jsonRequest('POST', '{}'));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        message: "No columns to write on table 'notes'",
        code: 'EMPTY_WRITE_SET',
        details: { table: 'notes' },
      });
    });

    test('rejects invalid JSON', async () => {
      const res = await app.request('/rest/notes', jsonRequest('POST', 'not json'));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        message: 'Invalid JSON in request body',
        code: 'INVALID_REQUEST',
      });
    });

    test('rejects forged tokens', async () => {
      const forger = new ClaimsService({ ...TEST_CLAIMS_CONFIG, secret: 'another-test-secret' }, fixedClock());
      const token = forger.sign(forger.issue('user-a'));

      const res = await app.request('/rest/notes', {
        headers: { Authorization: `Bearer ${token}` },
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        message: 'Token signature is invalid',
        code: 'SIGNATURE_INVALID',
      });
    });
  });

  describe('statusFor', () => {
    test('maps engine errors to HTTP statuses', () => {
      expect(statusFor(new PolicyDeniedError())).toBe(403);
      expect(statusFor(new PolicyConflictError('p'))).toBe(409);
      expect(statusFor(new TokenExpiredError(new Date(0)))).toBe(401);
      expect(statusFor(new CatalogError('boom'))).toBe(500);
    });
  });
});
