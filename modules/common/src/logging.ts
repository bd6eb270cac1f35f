/**
 * modules/common/src/logging.ts
 *
 * @file Logging setup. Configures a console appender on the root logger once, on first import. The root level is
 * read from `DIALOG_LAYOUT_LOG_LEVEL` (DEBUG, INFO, WARN or ERROR) and defaults to INFO.
 */
import process from 'node:process';
import {configureLogging, useLog} from '@mburchard/bit-log';
import {ConsoleAppender} from '@mburchard/bit-log/appender/ConsoleAppender';

export const LOG_LEVEL_ENV = 'DIALOG_LAYOUT_LOG_LEVEL';

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevelName = typeof LOG_LEVELS[number];

/**
 * Parse a log level name, case-insensitive.
 *
 * @param raw - Value of the environment variable, if set.
 * @returns The matching level, or undefined if the value is missing or unknown.
 */
export function parseLogLevel(raw: string | undefined): LogLevelName | undefined {
  const normalized = raw?.trim().toUpperCase();
  return LOG_LEVELS.find(level => level === normalized);
}

const rawLevel = process.env[LOG_LEVEL_ENV];
const level = parseLogLevel(rawLevel) ?? 'INFO';

configureLogging({
  appender: {
    CONSOLE: {
      Class: ConsoleAppender,
      colored: true,
      pretty: true,
    },
  },
  root: {
    appender: ['CONSOLE'],
    level,
  },
});

if (rawLevel !== undefined && parseLogLevel(rawLevel) === undefined) {
  useLog('common.logging').warn(`Unknown ${LOG_LEVEL_ENV} '${rawLevel}', using INFO`);
}

export const getLogger = useLog;
