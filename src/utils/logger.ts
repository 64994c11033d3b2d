import '../env.js';
import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Service-wide pino logger.
 *
 * `.env` files are loaded before the level is read. An unknown LOG_LEVEL
 * falls back to info here and is reported by `config.ts`. Customer emails
 * and contact details are redacted; log ids instead.
 */
const envLevel = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.token', '*.secret', '*.apiKey', '*.api_key', '*.authorization', '*.email'],
    censor: '[REDACTED]',
  },
});

/**
 * Scoped logger; every service passes `{ module }`
 */
export function createChildLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}
