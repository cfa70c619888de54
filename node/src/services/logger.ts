// src/services/logger.ts: structured logging for the search backend
import { Logger } from 'tslog';

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'travel-search',
  minLevel: LEVELS[(process.env.LOG_LEVEL ?? 'info').toLowerCase()] ?? LEVELS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

/** Re-applies the level once the validated config is available. */
export function setLogLevel(level: LogLevel): void {
  logger.settings.minLevel = LEVELS[level];
}
