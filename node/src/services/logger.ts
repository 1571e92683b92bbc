// src/services/logger.ts — structured logging for the flight search backend
import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

type LogLevelName = keyof typeof LOG_LEVELS;

export type AppLogger = Logger<ILogObj>;

function isLogLevelName(level: string | undefined): level is LogLevelName {
  return level !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

function resolveMinLevel(level: string | undefined): number {
  if (isLogLevelName(level)) {
    return LOG_LEVELS[level];
  }
  return process.env.NODE_ENV === 'test' ? LOG_LEVELS.fatal : LOG_LEVELS.info;
}

export const logger: AppLogger = new Logger<ILogObj>({
  name: 'flight-search',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
});
