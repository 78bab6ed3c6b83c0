/**
 * Structured logging for the repository layer.
 *
 * - Development: pretty-printed through pino-pretty
 * - Everywhere else: JSON lines
 *
 * Each repository logs through its own child logger:
 *   const log = logger.child({ module: 'activities' });
 *   log.debug({ activityId }, 'update activity');
 */

import { pino, type Logger } from 'pino';
import { defaultLogLevel } from './config.js';

const env = process.env.NODE_ENV;
const isDev = env === undefined || env === 'development';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLogLevel(env),

  redact: {
    paths: ['password', 'hashedPassword', '*.password', '*.hashedPassword'],
    censor: '[REDACTED]',
  },

  base: {
    service: 'waypoint-repositories',
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

export type { Logger };
