import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const DEFAULT_LEVEL = 'warn';

export interface LoggerConfig {
  /** pino level; falls back to STASHKIT_LOG_LEVEL, then 'warn'. */
  level?: string;
  /** Extra bindings attached to every line. */
  base?: Record<string, unknown>;
}

/**
 * Builds the library's default pino logger.
 * Writes JSON lines to stderr so a host's stdout stays its own; pass a
 * logger in `StorageOptions` to route them elsewhere.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: 'stashkit',
    level: config.level ?? process.env.STASHKIT_LOG_LEVEL ?? DEFAULT_LEVEL,
    base: config.base ?? null,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return pino(options, pino.destination({ dest: 2, sync: true }));
}
