// Environment configuration
//
// Values are read from process.env once per loadConfig() call and validated
// with zod. Nothing here reads files: deployments inject the variables.

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Config = {
  env: 'development' | 'test' | 'production';
  database: {
    url: string;
    maxConnections: number;
  };
  logLevel: LogLevel;
};

/**
 * Default log level when LOG_LEVEL is not set.
 */
export function defaultLogLevel(env: string | undefined): LogLevel {
  if (env === 'test') return 'silent';
  if (env === 'production') return 'info';
  return 'debug';
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigurationError naming every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(keys, `Invalid environment configuration: ${keys.join(', ')}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    database: {
      url: values.DATABASE_URL,
      maxConnections: values.DATABASE_MAX_CONNECTIONS,
    },
    logLevel: values.LOG_LEVEL ?? defaultLogLevel(values.NODE_ENV),
  };
}
