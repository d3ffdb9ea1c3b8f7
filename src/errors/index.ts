/**
 * Error types for tablegate
 *
 * Every failure the engine surfaces carries a stable `code` so that the
 * transport layer can map it without string matching.
 */

/**
 * Serialized error shape returned to callers
 */
export interface ErrorBody {
  readonly message: string;
  readonly code: string;
  readonly details?: unknown;
}

/**
 * Base error class for tablegate errors
 */
export class TablegateError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'TablegateError';
    this.code = code;
    if (details !== undefined) this.details = details;
    Object.setPrototypeOf(this, TablegateError.prototype);
  }

  toJSON(): ErrorBody {
    return this.details === undefined
      ? { message: this.message, code: this.code }
      : { message: this.message, code: this.code, details: this.details };
  }
}

/**
 * Unknown table or policy
 */
export class NotFoundError extends TablegateError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Metadata source unreachable or returned a document we cannot read
 */
export class CatalogError extends TablegateError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CATALOG_ERROR');
    this.name = 'CatalogError';
    if (cause !== undefined) this.cause = cause;
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}

/**
 * A column or table identifier is not a plain identifier, or does not exist
 */
export class InvalidColumnSetError extends TablegateError {
  public readonly columns: readonly string[];

  constructor(message: string, columns: readonly string[]) {
    super(message, 'INVALID_COLUMN_SET', { columns });
    this.name = 'InvalidColumnSetError';
    this.columns = columns;
    Object.setPrototypeOf(this, InvalidColumnSetError.prototype);
  }
}

/**
 * Insert or update without any column to write
 */
export class EmptyWriteSetError extends TablegateError {
  constructor(table: string) {
    super(`No columns to write on table '${table}'`, 'EMPTY_WRITE_SET', { table });
    this.name = 'EmptyWriteSetError';
    Object.setPrototypeOf(this, EmptyWriteSetError.prototype);
  }
}

/**
 * A write was rejected by the table's access policies.
 *
 * The message is fixed: callers never learn which policy failed.
 */
export class PolicyDeniedError extends TablegateError {
  constructor() {
    super('write rejected by access policy', 'POLICY_DENIED');
    this.name = 'PolicyDeniedError';
    Object.setPrototypeOf(this, PolicyDeniedError.prototype);
  }
}

/**
 * A policy with the same name already exists
 */
export class PolicyConflictError extends TablegateError {
  constructor(name: string) {
    super(`Policy '${name}' already exists`, 'POLICY_CONFLICT', { name });
    this.name = 'PolicyConflictError';
    Object.setPrototypeOf(this, PolicyConflictError.prototype);
  }
}

/**
 * Administrative statement or policy definition that cannot be used
 */
export class PolicyDefinitionError extends TablegateError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_POLICY', details);
    this.name = 'PolicyDefinitionError';
    Object.setPrototypeOf(this, PolicyDefinitionError.prototype);
  }
}

/**
 * Base class for token verification failures
 */
export class ClaimsError extends TablegateError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = 'ClaimsError';
    Object.setPrototypeOf(this, ClaimsError.prototype);
  }
}

export class SignatureInvalidError extends ClaimsError {
  constructor(message = 'Token signature is invalid') {
    super(message, 'SIGNATURE_INVALID');
    this.name = 'SignatureInvalidError';
    Object.setPrototypeOf(this, SignatureInvalidError.prototype);
  }
}

export class TokenExpiredError extends ClaimsError {
  public readonly expiredAt: Date;

  constructor(expiredAt: Date) {
    super('Token expired', 'TOKEN_EXPIRED');
    this.name = 'TokenExpiredError';
    this.expiredAt = expiredAt;
    Object.setPrototypeOf(this, TokenExpiredError.prototype);
  }
}

export class TokenNotYetValidError extends ClaimsError {
  public readonly notBefore: Date;

  constructor(notBefore: Date) {
    super('Token not yet valid', 'TOKEN_NOT_YET_VALID');
    this.name = 'TokenNotYetValidError';
    this.notBefore = notBefore;
    Object.setPrototypeOf(this, TokenNotYetValidError.prototype);
  }
}

export class AudienceMismatchError extends ClaimsError {
  constructor() {
    super('Token audience mismatch', 'AUDIENCE_MISMATCH');
    this.name = 'AudienceMismatchError';
    Object.setPrototypeOf(this, AudienceMismatchError.prototype);
  }
}

export class IssuerMismatchError extends ClaimsError {
  constructor() {
    super('Token issuer mismatch', 'ISSUER_MISMATCH');
    this.name = 'IssuerMismatchError';
    Object.setPrototypeOf(this, IssuerMismatchError.prototype);
  }
}

/**
 * Failed registration or login.
 *
 * Login failures always use the same message whether or not the account exists.
 */
export class InvalidCredentialsError extends TablegateError {
  constructor(message = 'Invalid credentials') {
    super(message, 'INVALID_CREDENTIALS');
    this.name = 'InvalidCredentialsError';
    Object.setPrototypeOf(this, InvalidCredentialsError.prototype);
  }
}

/**
 * Invalid process configuration
 */
export class ConfigError extends TablegateError {
  public readonly keys: readonly string[];

  constructor(message: string, keys: readonly string[]) {
    super(message, 'CONFIG_ERROR', { keys });
    this.name = 'ConfigError';
    this.keys = keys;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
