/**
 * pino logger factory.
 *
 * - LOG_LEVEL controls the level (default "info", "silent" when NODE_ENV=test)
 * - interactive, non-production runs get pino-pretty on stdout
 * - everything else is JSON on stdout
 */

import pino from 'pino';

export type Logger = pino.Logger;

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const LOG_LEVEL = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

export function createLogger(name: string): Logger {
  const pretty = !isProduction && !isTest && process.stdout.isTTY === true;

  return pino({
    name,
    level: LOG_LEVEL,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  });
}

export const logger = createLogger('printfleet');
