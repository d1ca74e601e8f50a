/**
 * Logging for the SDK and CLI
 *
 * One winston logger writes every level to stderr so CLI output on stdout
 * stays machine-readable. Library use is quiet by default (`warn`).
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.OWUI_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

const rootLogger = winston.createLogger({
  level: initialLevel(),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, module }) =>
      `${String(timestamp)} - ${String(module ?? 'owui')} - ${level.toUpperCase()} - ${String(message)}`
    )
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: [...LOG_LEVELS],
    }),
  ],
});

export type Logger = winston.Logger;

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

export function getLogLevel(): string {
  return rootLogger.level;
}
