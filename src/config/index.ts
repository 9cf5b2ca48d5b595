import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { getLogger } from '../logging/index.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      getLogger('config').warn({ err: error, filePath }, 'Could not read secret file');
    }
  }

  // Fall back to direct environment variable
  return env[envVar];
}

const byteLength = (value: string) => Buffer.byteLength(value, 'utf8');

const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    nodeEnv: z.string().min(1),
    corsOrigins: z.array(z.string()),
  }),
  secrets: z.object({
    jwtSecret: z
      .string({ required_error: 'JWT_SECRET is required' })
      .refine((value) => byteLength(value) >= constants.MIN_SIGNING_SECRET_BYTES, {
        message: `JWT_SECRET must be at least ${constants.MIN_SIGNING_SECRET_BYTES} bytes`,
      }),
  }),
  tokens: z.object({
    accessTokenTtlMs: z.coerce.number().int().min(1000),
    refreshTokenTtlMs: z.coerce.number().int().min(1000),
    sweepIntervalMs: z.coerce.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),
});

/**
 * Application configuration loaded from environment
 */
export type Config = z.infer<typeof configSchema>;

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Load configuration from environment variables
 *
 * Throws a ZodError describing every invalid setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    server: {
      port: env['PORT'] ?? constants.DEFAULT_PORT,
      host: env['HOST'] ?? constants.DEFAULT_HOST,
      nodeEnv: env['NODE_ENV'] ?? 'development',
      corsOrigins: parseList(env['CORS_ORIGINS']),
    },
    secrets: {
      jwtSecret: readSecret(env, 'JWT_SECRET'),
    },
    tokens: {
      accessTokenTtlMs: env['ACCESS_TOKEN_TTL_MS'] ?? constants.DEFAULT_ACCESS_TOKEN_TTL_MS,
      refreshTokenTtlMs: env['REFRESH_TOKEN_TTL_MS'] ?? constants.DEFAULT_REFRESH_TOKEN_TTL_MS,
      sweepIntervalMs: env['TOKEN_SWEEP_INTERVAL_MS'] ?? 0,
    },
    logging: {
      level: env['LOG_LEVEL'] ?? constants.DEFAULT_LOG_LEVEL,
    },
  });
}

// Singleton config instance. Immutable once loaded.
let config: Readonly<Config> | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Readonly<Config> {
  if (!config) {
    config = Object.freeze(loadConfig());
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
