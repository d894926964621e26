/**
 * Pino logging. Credentials and request headers are redacted.
 */

import pino from 'pino';
import { loadLoggingEnv } from '@/core/env';

const { level, pretty } = loadLoggingEnv();

export const logger = pino({
  level,
  redact: {
    paths: ['password', 'secret', 'token', 'authorization', '*.token', 'headers.authorization', 'headers.cookie'],
    censor: '[REDACTED]',
  },
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: { colorize: true, ignore: 'pid,hostname', translateTime: 'SYS:HH:MM:ss' },
      }
    : undefined,
});

export type Logger = pino.Logger;

/** Child logger tagged with the component name, e.g. 'rates'. */
export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
