import pino from 'pino';

/**
 * Process logger. Writes JSON lines to stderr so that stdout carries only
 * command output (tables, CSV, JSON).
 */

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino(
  { name: 'holdings-history', level: defaultLevel() },
  pino.destination(2)
);

export type Logger = typeof logger;
