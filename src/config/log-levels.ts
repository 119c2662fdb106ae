import { ConsoleLogger, LogLevel } from '@nestjs/common';

export const LOG_LEVEL_NAMES = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LEVEL_SETS: Record<LogLevelName, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

export function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/** Nest enables levels individually, so a threshold name expands to every level at or above it. */
export function resolveLogLevels(level: LogLevelName): LogLevel[] {
  return [...LEVEL_SETS[level]];
}

export function createConsoleLogger(level: LogLevelName): ConsoleLogger {
  return new ConsoleLogger('', { logLevels: resolveLogLevels(level) });
}
