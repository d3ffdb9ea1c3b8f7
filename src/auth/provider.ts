/**
 * SQLite Credential Store
 *
 * Keeps email/password accounts in SQLite (passwords hashed with bcrypt)
 * and issues signed session tokens on login. Tokens are self-contained:
 * nothing about a session is stored server-side.
 */

import Database from 'better-sqlite3';
import bcrypt from 'bcryptjs';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { InvalidCredentialsError } from '../errors/index.js';
import { AUTH_USERS_TABLE, BCRYPT_ROUNDS, MIN_PASSWORD_LENGTH } from '../utils/constants.js';
import type { ClaimsService } from './jwt.js';
import type { AuthSession, AuthUser, CredentialStore } from './types.js';

const userRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

type UserRow = z.infer<typeof userRowSchema>;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

/**
 * SQLite-based credential store
 */
export class SqliteCredentialStore implements CredentialStore {
  private db: Database.Database;
  private claims: ClaimsService;

  constructor(db: Database.Database, claims: ClaimsService) {
    this.db = db;
    this.claims = claims;

    this.initializeSchema();
  }

  /**
   * Initialize database schema for accounts
   */
  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${AUTH_USERS_TABLE} (
        id TEXT PRIMARY KEY,
        email TEXT UNIQUE NOT NULL,
        password_hash TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }

  /**
   * Create a new account
   *
   * @throws InvalidCredentialsError for a malformed email, a short password,
   *   mismatched confirmation or an email that is already registered
   */
  async register(email: string, password: string, confirmPassword: string): Promise<AuthUser> {
    const normalized = email.trim().toLowerCase();

    if (!EMAIL_PATTERN.test(normalized)) {
      throw new InvalidCredentialsError('A valid email is required');
    }

    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new InvalidCredentialsError(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
      );
    }

    if (password !== confirmPassword) {
      throw new InvalidCredentialsError('Passwords do not match');
    }

    if (this.findByEmail(normalized)) {
      throw new InvalidCredentialsError('Email already registered');
    }

    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    const id = randomUUID();
    const now = new Date().toISOString();

    // A concurrent registration can take the email while the hash is computed
    try {
      this.db
        .prepare(
          `INSERT INTO ${AUTH_USERS_TABLE} (id, email, password_hash, created_at, updated_at) VALUES (?, ?, ?, ?, ?)`
        )
        .run(id, normalized, passwordHash, now, now);
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new InvalidCredentialsError('Email already registered');
      }
      throw error;
    }

    return {
      id,
      email: normalized,
      createdAt: new Date(now),
      updatedAt: new Date(now),
    };
  }

  /**
   * Authenticate an account and issue a session token
   *
   * @throws InvalidCredentialsError with the same message for an unknown
   *   email and a wrong password
   */
  async login(email: string, password: string): Promise<AuthSession> {
    const row = this.findByEmail(email.trim().toLowerCase());
    if (!row) {
      throw new InvalidCredentialsError();
    }

    const valid = await bcrypt.compare(password, row.password_hash);
    if (!valid) {
      throw new InvalidCredentialsError();
    }

    const claims = this.claims.issue(row.id);

    return {
      user: toUser(row),
      accessToken: this.claims.sign(claims),
      claims,
    };
  }

  /**
   * Get account by id
   */
  async getUser(id: string): Promise<AuthUser | null> {
    const row = this.parseRow(
      this.db.prepare(`SELECT * FROM ${AUTH_USERS_TABLE} WHERE id = ?`).get(id)
    );
    return row ? toUser(row) : null;
  }

  private findByEmail(email: string): UserRow | null {
    return this.parseRow(
      this.db.prepare(`SELECT * FROM ${AUTH_USERS_TABLE} WHERE email = ?`).get(email)
    );
  }

  private parseRow(row: unknown): UserRow | null {
    if (row === undefined) {
      return null;
    }
    return userRowSchema.parse(row);
  }
}

function toUser(row: UserRow): AuthUser {
  return {
    id: row.id,
    email: row.email,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
