/**
 * Structured logger.
 *
 * JSON lines in production, pretty-printed in development.
 *
 *   logger.info({ reportId, userId }, 'Cleanup photo submitted');
 *   const log = logger.child({ module: 'lifecycle' });
 */

import pino from 'pino';

const env = process.env.NODE_ENV || 'development';
const isDev = env === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'password',
      'token',
      'secret',
      'confirmationCode',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'waste-report-api',
    env,
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

export const lifecycleLogger = logger.child({ module: 'lifecycle' });
export const scoringLogger = logger.child({ module: 'scoring' });
export const dbLogger = logger.child({ module: 'db' });
export const httpLogger = logger.child({ module: 'http' });
export const workerLogger = logger.child({ module: 'worker' });
