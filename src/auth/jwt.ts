/**
 * JWT Utilities
 *
 * Issues, signs and verifies identity claims as HS256 compact JWTs.
 * Timestamps are JWT NumericDates (whole seconds). The clock is injectable
 * so that expiry and not-before checks can be tested deterministically.
 */

import jwt from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  AudienceMismatchError,
  IssuerMismatchError,
  SignatureInvalidError,
  TokenExpiredError,
  TokenNotYetValidError,
} from '../errors/index.js';
import { NOT_BEFORE_SKEW_SECONDS, ROLE_ANON, ROLE_AUTHENTICATED } from '../utils/constants.js';
import type { Claims, ClaimsConfig, Clock, RequestContext } from './types.js';

const SYSTEM_CLOCK: Clock = () => Date.now();

/**
 * Wire payload of a signed token
 */
const payloadSchema = z.object({
  sub: z.string(),
  iss: z.string(),
  aud: z.string(),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
  jti: z.string(),
});

export interface IssueOptions {
  readonly subject: string;
  readonly issuer: string;
  readonly audience: string;
  readonly ttlSeconds: number;
}

export interface VerifyOptions {
  readonly issuer: string;
  readonly audience: string;
}

/**
 * Build a fresh set of claims
 *
 * @example
 * issueClaims({ subject: 'u1', issuer: 'tablegate', audience: 'authenticated', ttlSeconds: 60 })
 */
export function issueClaims(options: IssueOptions, clock: Clock = SYSTEM_CLOCK): Claims {
  const now = toSeconds(clock());

  return {
    subject: options.subject,
    issuer: options.issuer,
    audience: options.audience,
    issuedAt: now,
    notBefore: now - NOT_BEFORE_SKEW_SECONDS,
    expiration: now + options.ttlSeconds,
    tokenId: randomUUID(),
  };
}

/**
 * Sign claims into a compact HS256 token
 */
export function signClaims(claims: Claims, key: string): string {
  return jwt.sign(
    {
      sub: claims.subject,
      iss: claims.issuer,
      aud: claims.audience,
      iat: claims.issuedAt,
      nbf: claims.notBefore,
      exp: claims.expiration,
      jti: claims.tokenId,
    },
    key,
    { algorithm: 'HS256' }
  );
}

/**
 * Verify a token and return its claims.
 *
 * Checks run in a fixed order: signature, expiration, not-before, audience,
 * issuer. The first failing check decides the error.
 */
export function verifyToken(
  token: string,
  key: string,
  options: VerifyOptions,
  clock: Clock = SYSTEM_CLOCK
): Claims {
  let decoded: unknown;
  try {
    // Time-based checks are done below against the injected clock
    decoded = jwt.verify(token, key, {
      algorithms: ['HS256'],
      ignoreExpiration: true,
      ignoreNotBefore: true,
    });
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      throw new SignatureInvalidError();
    }
    throw error;
  }

  const parsed = payloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new SignatureInvalidError('Token payload is malformed');
  }

  const payload = parsed.data;
  const now = toSeconds(clock());

  if (now > payload.exp) {
    throw new TokenExpiredError(new Date(payload.exp * 1000));
  }
  if (now < payload.nbf) {
    throw new TokenNotYetValidError(new Date(payload.nbf * 1000));
  }
  if (payload.aud !== options.audience) {
    throw new AudienceMismatchError();
  }
  if (payload.iss !== options.issuer) {
    throw new IssuerMismatchError();
  }

  return {
    subject: payload.sub,
    issuer: payload.iss,
    audience: payload.aud,
    issuedAt: payload.iat,
    notBefore: payload.nbf,
    expiration: payload.exp,
    tokenId: payload.jti,
  };
}

/**
 * Claims issuer/verifier bound to one key, issuer and audience
 */
export class ClaimsService {
  private config: ClaimsConfig;
  private clock: Clock;

  constructor(config: ClaimsConfig, clock: Clock = SYSTEM_CLOCK) {
    this.config = config;
    this.clock = clock;
  }

  issue(subject: string): Claims {
    return issueClaims(
      {
        subject,
        issuer: this.config.issuer,
        audience: this.config.audience,
        ttlSeconds: this.config.ttlSeconds,
      },
      this.clock
    );
  }

  sign(claims: Claims): string {
    return signClaims(claims, this.config.secret);
  }

  verify(token: string): Claims {
    return verifyToken(
      token,
      this.config.secret,
      { issuer: this.config.issuer, audience: this.config.audience },
      this.clock
    );
  }

  /**
   * Resolve the request context from an `Authorization` header value.
   * No header means an anonymous request; a header that is present must
   * carry a valid bearer token.
   */
  contextFromToken(authorizationHeader: string | undefined): RequestContext {
    if (authorizationHeader === undefined || authorizationHeader.trim() === '') {
      return { role: ROLE_ANON };
    }

    const match = /^Bearer\s+(\S+)$/i.exec(authorizationHeader.trim());
    if (!match) {
      throw new SignatureInvalidError('Malformed authorization header');
    }

    const claims = this.verify(match[1]!);
    return { role: ROLE_AUTHENTICATED, subject: claims.subject };
  }
}

function toSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}
