/**
 * Configuration
 *
 * Reads process settings from environment variables.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import {
  DEFAULT_JWT_AUDIENCE,
  DEFAULT_JWT_ISSUER,
  DEFAULT_SESSION_DURATION_SECONDS,
} from '../utils/constants.js';
import type { LogLevel } from '../utils/logger.js';

export interface AppConfig {
  readonly port: number;
  readonly databasePath: string;
  readonly jwt: {
    readonly secret: string;
    readonly issuer: string;
    readonly audience: string;
    readonly ttlSeconds: number;
  };
  readonly logLevel: LogLevel;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_PATH: z.string().min(1).default('data.db'),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ISSUER: z.string().min(1).default(DEFAULT_JWT_ISSUER),
  JWT_AUDIENCE: z.string().min(1).default(DEFAULT_JWT_AUDIENCE),
  SESSION_TTL_SECONDS: z.coerce.number().int().default(DEFAULT_SESSION_DURATION_SECONDS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Load configuration from an environment map
 *
 * @throws ConfigError naming every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigError(`Invalid configuration: ${keys.join(', ')}`, keys);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    databasePath: values.DATABASE_PATH,
    jwt: {
      secret: values.JWT_SECRET,
      issuer: values.JWT_ISSUER,
      audience: values.JWT_AUDIENCE,
      ttlSeconds: values.SESSION_TTL_SECONDS,
    },
    logLevel: values.LOG_LEVEL,
  };
}
