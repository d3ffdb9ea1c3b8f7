/**
 * Authentication Module
 *
 * Identity claims (HS256 JWTs) and the email/password credential store
 * that issues them.
 */

// Credential store
export { SqliteCredentialStore } from './provider.js';

// JWT Utilities
export {
  ClaimsService,
  issueClaims,
  signClaims,
  verifyToken,
  type IssueOptions,
  type VerifyOptions,
} from './jwt.js';

// Types
export type {
  AuthSession,
  AuthUser,
  Claims,
  ClaimsConfig,
  Clock,
  CredentialStore,
  RequestContext,
} from './types.js';
