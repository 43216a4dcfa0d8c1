/**
 * shopify-gql-extract
 *
 * Logger Module
 *
 * Structured logging through a pino singleton. Call initLogger() once at
 * startup; modules that log before that get an info-level default.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

/**
 * Logger initialization options.
 */
export interface LoggerOptions {
  /** Minimum level to emit (default: LOG_LEVEL env or 'info') */
  level?: LevelWithSilent;
  /** Render through pino-pretty instead of JSON lines */
  pretty?: boolean;
}

let loggerInstance: Logger | null = null;

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function defaultLevel(): LevelWithSilent {
  const fromEnv = process.env['LOG_LEVEL'];
  return fromEnv && isLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Initializes the shared logger.
 *
 * @example
 * ```typescript
 * initLogger({ level: 'debug', pretty: true });
 * ```
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? defaultLevel();

  if (options.pretty) {
    loggerInstance = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    loggerInstance = pino({ level });
  }

  return loggerInstance;
}

/**
 * Gets the shared logger, creating a default one if needed.
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = initLogger();
  }
  return loggerInstance;
}
