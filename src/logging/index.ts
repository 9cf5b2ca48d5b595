import { pino, type Logger, type LoggerOptions, type DestinationStream } from 'pino';

/**
 * Logging built on pino
 *
 * One root logger per process, component loggers derived from it with
 * `getLogger('auth-service')`. Anything that could carry a credential is
 * redacted before it is written.
 */

export const REDACT_PATHS = [
  'password',
  'passwordHash',
  'token',
  'accessToken',
  'refreshToken',
  'secret',
  '*.password',
  '*.passwordHash',
  '*.token',
  '*.accessToken',
  '*.refreshToken',
  '*.secret',
  'headers.authorization',
  'req.headers.authorization',
];

export interface LoggerConfig {
  level: string;
  stream?: DestinationStream;
}

let rootLogger: Logger | null = null;

function createRootLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return config.stream ? pino(options, config.stream) : pino(options);
}

/**
 * Configure the root logger. Replaces any logger created earlier.
 */
export function initializeLogger(config: LoggerConfig): Logger {
  rootLogger = createRootLogger(config);
  return rootLogger;
}

/**
 * Get the root logger, creating it from LOG_LEVEL on first use
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger({ level: process.env['LOG_LEVEL'] ?? 'info' });
  }
  return rootLogger;
}

/**
 * Get a component-scoped child logger
 */
export function getLogger(component: string): Logger {
  return getRootLogger().child({ component });
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

export type { Logger };
