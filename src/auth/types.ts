/**
 * Auth System Type Definitions
 */

import type { Role } from '../utils/constants.js';

/**
 * Authenticated identity payload carried by a signed token
 */
export interface Claims {
  /** Opaque identity id (`sub`) */
  readonly subject: string;
  /** `iss` */
  readonly issuer: string;
  /** `aud` */
  readonly audience: string;
  /** `iat`, seconds since epoch */
  readonly issuedAt: number;
  /** `nbf`, seconds since epoch */
  readonly notBefore: number;
  /** `exp`, seconds since epoch */
  readonly expiration: number;
  /** `jti`, unique per issuance */
  readonly tokenId: string;
}

/**
 * Request context carrying auth information.
 * This is what policy expressions see through `auth.uid()` / `auth.role()`.
 */
export interface RequestContext {
  readonly role: Role;

  /** Subject of the verified token (only present for authenticated requests) */
  readonly subject?: string;
}

/**
 * Clock used for issuing and verifying claims; milliseconds since epoch
 */
export type Clock = () => number;

/**
 * Registered account, as returned to callers (never includes the hash)
 */
export interface AuthUser {
  readonly id: string;
  readonly email: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Result of a successful login
 */
export interface AuthSession {
  readonly user: AuthUser;
  readonly accessToken: string;
  readonly claims: Claims;
}

/**
 * Claims signing configuration
 */
export interface ClaimsConfig {
  /** HMAC secret for HS256 */
  readonly secret: string;
  readonly issuer: string;
  readonly audience: string;
  /** Token lifetime in seconds */
  readonly ttlSeconds: number;
}

/**
 * Account registry and login
 */
export interface CredentialStore {
  /**
   * Create a new account
   */
  register(email: string, password: string, confirmPassword: string): Promise<AuthUser>;

  /**
   * Check a password and issue a signed session token
   */
  login(email: string, password: string): Promise<AuthSession>;

  /**
   * Get an account by id
   */
  getUser(id: string): Promise<AuthUser | null>;
}
