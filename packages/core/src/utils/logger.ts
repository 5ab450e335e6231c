/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging to stderr. stdout belongs to prompts and to the VPN
 * client, so nothing here ever writes to it.
 */

import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'password',
        'passCode',
        'stateToken',
        'sessionToken',
        'preloginCookie',
        'totpKey',
        '*.password',
        '*.passCode',
        '*.stateToken',
        '*.sessionToken',
      ],
      censor: '[REDACTED]',
    },
  },
  pino.destination(2)
);

export type Logger = typeof logger;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
