/**
 * Structured logger.
 *
 * Pino JSON lines in production, pino-pretty in development.
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'poller' });
 *   log.info({ entryId }, 'Refreshing account');
 */

import pino, { type Logger } from 'pino';
import { env, isDev } from '../config/env.js';

export type { Logger };

export const logger = pino({
  level: env.LOG_LEVEL,

  redact: {
    paths: ['token', 'secret', 'apiSecret', 'appKey', 'req.headers.authorization'],
    censor: '[REDACTED]',
  },

  base: {
    service: 'meter-ledger',
    env: env.NODE_ENV,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export const meteringLogger = logger.child({ module: 'metering' });
export const storeLogger = logger.child({ module: 'history-store' });
export const upstreamLogger = logger.child({ module: 'upstream' });
export const pollerLogger = logger.child({ module: 'poller' });
