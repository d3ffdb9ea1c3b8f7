/**
 * Auth Context Middleware Tests
 */

import { describe, test, expect } from 'vitest';
import { Hono } from 'hono';
import { ClaimsService } from '../../src/auth/jwt.js';
import { ClaimsError } from '../../src/errors/index.js';
import { authContextMiddleware } from '../../src/middleware/auth-context.js';
import type { AppEnv } from '../../src/middleware/types.js';
import { TEST_CLAIMS_CONFIG, fixedClock } from '../helpers/jwt.js';

describe('authContextMiddleware', () => {
  const claims = new ClaimsService(TEST_CLAIMS_CONFIG, fixedClock());

  function createApp(): Hono<AppEnv> {
    const app = new Hono<AppEnv>();
    app.onError((error, c) => {
      if (error instanceof ClaimsError) {
        return c.json(error.toJSON(), 401);
      }
      return c.json({ message: error.message }, 500);
    });
    app.use('*', authContextMiddleware(claims));
    app.get('/whoami', (c) => c.json(c.get('authContext')));
    return app;
  }

  test('treats requests without a token as anonymous', async () => {
    const res = await createApp().request('/whoami');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ role: 'anon' });
  });

  test('resolves the subject of a valid bearer token', async () => {
    const token = claims.sign(claims.issue('user-a'));

    const res = await createApp().request('/whoami', {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ role: 'authenticated', subject: 'user-a' });
  });

  test('rejects tokens signed with another key', async () => {
    const other = new ClaimsService({ ...TEST_CLAIMS_CONFIG, secret: 'another-test-secret' }, fixedClock());
    const token = other.sign(other.issue('user-a'));

    const res = await createApp().request('/whoami', {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      message: 'Token signature is invalid',
      code: 'SIGNATURE_INVALID',
    });
  });

  test('rejects headers that are not bearer tokens', async () => {
    const res = await createApp().request('/whoami', {
      headers: { Authorization: 'Basic dXNlcjpwYXNz' },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      message: 'Malformed authorization header',
      code: 'SIGNATURE_INVALID',
    });
  });
});
