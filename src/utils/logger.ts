/**
 * Logger
 *
 * Components accept an optional `logger` and default to `silentLogger`, so the
 * library stays quiet unless the host wires `consoleLogger` (or its own) in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console-backed logger that drops messages below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  const write =
    (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (!enabled(level)) return;
      if (meta === undefined) {
        sink(`[tablegate] ${message}`);
      } else {
        sink(`[tablegate] ${message}`, meta);
      }
    };

  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

export const consoleLogger: Logger = createConsoleLogger('info');

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
