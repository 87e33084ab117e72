import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { LoggerConfigError } from "../logger/errors.js";
import type { LoggerOptions } from "../logger/types.js";

/**
 * Load a .env file into process.env when one exists
 */
export function loadDotEnv(path: string = resolve(process.cwd(), ".env")): boolean {
  if (!existsSync(path)) {
    return false;
  }
  process.loadEnvFile(path);
  return true;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getEnvInteger(env: Env, key: string): number | undefined {
  const value = getEnvVar(env, key);
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new LoggerConfigError(`Environment variable ${key} must be an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

/** Parse "10MB", "512kb" or a plain byte count */
export function parseSizeToBytes(input: string): number {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!match) {
    throw new LoggerConfigError(`Invalid size "${input}", expected e.g. 1048576, 512KB or 10MB`);
  }
  const amount = Number(match[1]);
  const unit = (match[2] ?? "b").toLowerCase();
  const factors: Record<string, number> = { b: 1, kb: 1024, mb: 1024 * 1024, gb: 1024 * 1024 * 1024 };
  return Math.floor(amount * (factors[unit] ?? 1));
}

export type ArchiveTargetOptions = Pick<LoggerOptions, "filePath" | "archiveDir">;

/**
 * LOG_FILE and LOG_ARCHIVE_DIR only; other LOG_* variables are not parsed
 */
export function loadArchiveTargetFromEnv(env: Env = process.env): ArchiveTargetOptions {
  const target: ArchiveTargetOptions = {};

  const filePath = getEnvVar(env, "LOG_FILE");
  if (filePath) target.filePath = filePath;

  const archiveDir = getEnvVar(env, "LOG_ARCHIVE_DIR");
  if (archiveDir) target.archiveDir = archiveDir;

  return target;
}

/**
 * Build logger options from LOG_* environment variables.
 * Unset variables are left out so the logger defaults apply.
 */
export function loadLoggerOptionsFromEnv(env: Env = process.env): LoggerOptions {
  const options: LoggerOptions = loadArchiveTargetFromEnv(env);

  const name = getEnvVar(env, "LOG_NAME");
  if (name) options.name = name;

  const level = getEnvVar(env, "LOG_LEVEL");
  if (level) options.level = level;

  const timestampFormat = getEnvVar(env, "LOG_TIMESTAMP_FORMAT");
  if (timestampFormat) options.timestampFormat = timestampFormat;

  const maxSize = getEnvVar(env, "LOG_MAX_FILE_SIZE");
  if (maxSize) options.maxFileSizeBytes = parseSizeToBytes(maxSize);

  const backupCount = getEnvInteger(env, "LOG_BACKUP_COUNT");
  if (backupCount !== undefined) options.backupCount = backupCount;

  return options;
}
