/**
 * Application Constants
 */

// HTTP Endpoints
export const HEALTH_ENDPOINT = '/health';

// Request roles
export const ROLE_ANON = 'anon' as const;
export const ROLE_AUTHENTICATED = 'authenticated' as const;

// Database
export const DEFAULT_SCHEMA = 'main';
export const POLICY_TABLE = '_policies';
export const AUTH_USERS_TABLE = 'auth_users';

/**
 * Tables owned by the engine itself, hidden from table listings
 */
export const SYSTEM_TABLES: ReadonlySet<string> = new Set([POLICY_TABLE, AUTH_USERS_TABLE]);

// Result columns of generated statements
export const DATA_COLUMN = 'data';
export const CHECK_GUARD_COLUMN = 'check_passed';

// JWT
export const DEFAULT_JWT_ISSUER = 'tablegate';
export const DEFAULT_JWT_AUDIENCE = 'authenticated';
export const DEFAULT_SESSION_DURATION_SECONDS = 3600;
export const NOT_BEFORE_SKEW_SECONDS = 1;

// Auth
export const MIN_PASSWORD_LENGTH = 8;
export const BCRYPT_ROUNDS = 10;

// RLS
export const ALLOW_ALL_SQL = '1 = 1';
export const DENY_ALL_SQL = '1 = 0';

export type Role = typeof ROLE_ANON | typeof ROLE_AUTHENTICATED;
