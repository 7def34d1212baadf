import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Valid values: "fatal" | "error" | "warn" | "log" | "debug" | "verbose"
 */
export type LogLevel = NestLogLevel;

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Every level at or above the given threshold, in the form NestFactory expects
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter(level => shouldLog(level, currentLevel));
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}
