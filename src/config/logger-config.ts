import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { LoggerConfigError } from "../logger/errors.js";
import { DEFAULT_TIMESTAMP_FORMAT } from "../logger/formatter.js";
import { parseLogLevel } from "../logger/levels.js";
import type { LoggerOptions, ResolvedLoggerConfig } from "../logger/types.js";

// ============================================
// LOGGER CONFIGURATION
// ============================================

export const DEFAULT_LOGGER_NAME = "ModelLogger";
export const DEFAULT_LEVEL = "INFO";
export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024; // 10MB
export const DEFAULT_BACKUP_COUNT = 5;

const nonEmptyPath = z.string().min(1);

export const loggerOptionsSchema = z.object({
  name: z.string().optional(),
  filePath: nonEmptyPath.optional(),
  timestampFormat: z.string().optional(),
  maxFileSizeBytes: z.number().int().positive().optional(),
  backupCount: z.number().int().min(0).optional(),
  archiveDir: nonEmptyPath.optional(),
});

/**
 * Archive directory used when none is configured: `<log dir>/logs/archive`
 */
export function defaultArchiveDir(filePath: string): string {
  return join(dirname(resolve(filePath)), "logs", "archive");
}

/**
 * Validate construction options and fill in defaults.
 * The level is checked first so an unknown name always surfaces as InvalidLevelError.
 */
export function resolveLoggerConfig(options: LoggerOptions = {}): ResolvedLoggerConfig {
  const minLevel = parseLogLevel(options.level ?? DEFAULT_LEVEL);

  const validation = loggerOptionsSchema.safeParse({
    name: options.name || undefined,
    filePath: options.filePath,
    timestampFormat: options.timestampFormat,
    maxFileSizeBytes: options.maxFileSizeBytes,
    backupCount: options.backupCount,
    archiveDir: options.archiveDir,
  });
  if (!validation.success) {
    throw new LoggerConfigError(`Invalid logger options: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { data } = validation;
  const filePath = data.filePath;

  return {
    name: data.name ?? DEFAULT_LOGGER_NAME,
    filePath,
    timestampFormat: data.timestampFormat ?? DEFAULT_TIMESTAMP_FORMAT,
    minLevel,
    maxFileSizeBytes: data.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
    backupCount: data.backupCount ?? DEFAULT_BACKUP_COUNT,
    archiveDir: filePath ? (data.archiveDir ?? defaultArchiveDir(filePath)) : data.archiveDir,
  };
}
