/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import { config } from '../config.js';

function resolveLevel(): string {
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return config.LOG_LEVEL.toLowerCase();
}

/**
 * Global logger instance configured with environment settings.
 * Pretty output only when a human is watching the terminal.
 */
export const logger = pino({
  level: resolveLevel(),
  transport:
    process.env.NODE_ENV !== 'production' && process.stdout.isTTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
