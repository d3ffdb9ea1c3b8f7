/**
 * JWT Claims Tests
 *
 * Issue, sign and verify tokens against a frozen clock.
 */

import { describe, test, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { ClaimsService, issueClaims, signClaims, verifyToken } from '../../src/auth/jwt.js';
import {
  AudienceMismatchError,
  IssuerMismatchError,
  SignatureInvalidError,
  TokenExpiredError,
  TokenNotYetValidError,
} from '../../src/errors/index.js';
import { TEST_CLAIMS_CONFIG, TEST_JWT_SECRET, TEST_NOW_MS, fixedClock } from '../helpers/jwt.js';

const NOW = TEST_NOW_MS / 1000;
const VERIFY = { issuer: 'tablegate', audience: 'authenticated' };

function issue(ttlSeconds = 60) {
  return issueClaims(
    { subject: 'user-1', issuer: 'tablegate', audience: 'authenticated', ttlSeconds },
    fixedClock()
  );
}

describe('issueClaims()', () => {
  test('stamps issue, not-before and expiry times in seconds', () => {
    const claims = issue(60);

    expect(claims.subject).toBe('user-1');
    expect(claims.issuer).toBe('tablegate');
    expect(claims.audience).toBe('authenticated');
    expect(claims.issuedAt).toBe(NOW);
    expect(claims.notBefore).toBe(NOW - 1);
    expect(claims.expiration).toBe(NOW + 60);
  });

  test('truncates the clock to whole seconds', () => {
    const claims = issueClaims(
      { subject: 'u', issuer: 'i', audience: 'a', ttlSeconds: 10 },
      fixedClock(TEST_NOW_MS + 999)
    );

    expect(claims.issuedAt).toBe(NOW);
  });

  test('gives every issuance its own token id', () => {
    const first = issue();
    const second = issue();

    expect(first.tokenId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first.tokenId).not.toBe(second.tokenId);
  });
});

describe('signClaims() / verifyToken()', () => {
  test('round-trips the claims', () => {
    const claims = issue();
    const token = signClaims(claims, TEST_JWT_SECRET);

    expect(token.split('.')).toHaveLength(3);
    expect(verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock())).toEqual(claims);
  });

  test('writes the registered claim names', () => {
    const claims = issue();
    const decoded = jwt.decode(signClaims(claims, TEST_JWT_SECRET), { complete: true });

    expect(decoded?.header.alg).toBe('HS256');
    expect(decoded?.payload).toEqual({
      sub: 'user-1',
      iss: 'tablegate',
      aud: 'authenticated',
      iat: NOW,
      nbf: NOW - 1,
      exp: NOW + 60,
      jti: claims.tokenId,
    });
  });

  test('rejects a token signed with another key', () => {
    const token = signClaims(issue(), 'another-test-secret');

    expect(() => verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock())).toThrow(SignatureInvalidError);
  });

  test('rejects a token whose payload was altered', () => {
    const [header, , signature] = signClaims(issue(), TEST_JWT_SECRET).split('.');
    const forged = Buffer.from(JSON.stringify({ sub: 'admin' })).toString('base64url');

    expect(() =>
      verifyToken(`${header}.${forged}.${signature}`, TEST_JWT_SECRET, VERIFY, fixedClock())
    ).toThrow(SignatureInvalidError);
  });

  test('rejects malformed tokens', () => {
    expect(() => verifyToken('not-a-token', TEST_JWT_SECRET, VERIFY, fixedClock())).toThrow(
      SignatureInvalidError
    );
  });

  test('rejects validly signed tokens with missing claims', () => {
    const token = jwt.sign({ sub: 'user-1' }, TEST_JWT_SECRET);

    expect(() => verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock())).toThrow(
      'Token payload is malformed'
    );
  });

  test('accepts a token up to and including its expiry second', () => {
    const token = signClaims(issue(60), TEST_JWT_SECRET);

    expect(() => verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock(TEST_NOW_MS + 60_000))).not.toThrow();
  });

  test('rejects an expired token', () => {
    const token = signClaims(issue(60), TEST_JWT_SECRET);

    try {
      verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock(TEST_NOW_MS + 61_000));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TokenExpiredError);
      if (error instanceof TokenExpiredError) {
        expect(error.expiredAt).toEqual(new Date((NOW + 60) * 1000));
      }
    }
  });

  test('rejects a token used before its not-before time', () => {
    const token = signClaims(issue(60), TEST_JWT_SECRET);

    expect(() => verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock(TEST_NOW_MS - 5_000))).toThrow(
      TokenNotYetValidError
    );
  });

  test('tolerates one second of clock skew', () => {
    const token = signClaims(issue(60), TEST_JWT_SECRET);

    expect(() => verifyToken(token, TEST_JWT_SECRET, VERIFY, fixedClock(TEST_NOW_MS - 1_000))).not.toThrow();
  });

  test('rejects another audience', () => {
    const token = signClaims(issue(), TEST_JWT_SECRET);

    expect(() =>
      verifyToken(token, TEST_JWT_SECRET, { ...VERIFY, audience: 'service' }, fixedClock())
    ).toThrow(AudienceMismatchError);
  });

  test('rejects another issuer', () => {
    const token = signClaims(issue(), TEST_JWT_SECRET);

    expect(() =>
      verifyToken(token, TEST_JWT_SECRET, { ...VERIFY, issuer: 'elsewhere' }, fixedClock())
    ).toThrow(IssuerMismatchError);
  });

  test('checks expiry before audience and audience before issuer', () => {
    const token = signClaims(issue(60), TEST_JWT_SECRET);
    const wrong = { issuer: 'elsewhere', audience: 'service' };

    expect(() => verifyToken(token, TEST_JWT_SECRET, wrong, fixedClock(TEST_NOW_MS + 120_000))).toThrow(
      TokenExpiredError
    );
    expect(() => verifyToken(token, TEST_JWT_SECRET, wrong, fixedClock())).toThrow(AudienceMismatchError);
  });
});

describe('ClaimsService', () => {
  const service = new ClaimsService(TEST_CLAIMS_CONFIG, fixedClock());

  test('issues claims from its configuration', () => {
    const claims = service.issue('user-9');

    expect(claims.subject).toBe('user-9');
    expect(claims.expiration - claims.issuedAt).toBe(3600);
    expect(service.verify(service.sign(claims))).toEqual(claims);
  });

  describe('contextFromToken()', () => {
    test('treats a missing header as anonymous', () => {
      expect(service.contextFromToken(undefined)).toEqual({ role: 'anon' });
      expect(service.contextFromToken('')).toEqual({ role: 'anon' });
    });

    test('resolves the subject of a bearer token', () => {
      const token = service.sign(service.issue('user-9'));

      expect(service.contextFromToken(`Bearer ${token}`)).toEqual({
        role: 'authenticated',
        subject: 'user-9',
      });
    });

    test('rejects other authorization schemes', () => {
      expect(() => service.contextFromToken('Basic dXNlcjpwYXNz')).toThrow(
        'Malformed authorization header'
      );
    });

    test('rejects invalid bearer tokens', () => {
      expect(() => service.contextFromToken('Bearer garbage')).toThrow(SignatureInvalidError);
    });
  });
});
