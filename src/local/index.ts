/**
 * Local Server
 *
 * Runs the API server with better-sqlite3 under Node.js.
 *
 * Usage:
 *   JWT_SECRET=... npm start
 *
 * Or programmatically:
 *   import { startServer } from './src/local/index.js';
 *   const server = await startServer(loadConfig());
 */

import { serve } from '@hono/node-server';
import Database from 'better-sqlite3';
import { pathToFileURL } from 'url';
import { createServer } from '../api/server.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { SqliteAdapter } from '../database/sqlite-adapter.js';
import { HEALTH_ENDPOINT } from '../utils/constants.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';

export interface LocalServer {
  stop: () => void;
  adapter: SqliteAdapter;
}

/**
 * Start the server on `config.port`
 */
export async function startServer(config: AppConfig, logger?: Logger): Promise<LocalServer> {
  const log = logger ?? createConsoleLogger(config.logLevel);

  const db = new Database(config.databasePath);
  db.pragma('foreign_keys = ON');
  const adapter = new SqliteAdapter(db);

  const app = createServer({ db: adapter, auth: config.jwt, logger: log });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  log.info(`Server running on http://localhost:${config.port}`);
  log.info(`Database: ${config.databasePath}`);
  log.info(`Health check: http://localhost:${config.port}${HEALTH_ENDPOINT}`);

  return {
    stop: () => {
      server.close();
      adapter.close();
    },
    adapter,
  };
}

/**
 * CLI entry point
 */
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const main = async (): Promise<void> => {
    await startServer(loadConfig());
  };

  main().catch((error: unknown) => {
    console.error('Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
