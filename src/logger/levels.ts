import { InvalidLevelError } from "./errors.js";
import { LogLevel } from "./types.js";

// ============================================
// LEVEL POLICY
// ============================================

/** Level priorities, lowest to highest */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve a level name (case-insensitive) to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel {
  const normalized = name.trim().toUpperCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidLevelError(name, LOG_LEVELS);
  }
  return normalized;
}

export function shouldLog(minLevel: LogLevel, level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}
