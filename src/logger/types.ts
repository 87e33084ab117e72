// ============================================
// LOGGER TYPES
// ============================================

import type { LogFormatter } from "./formatter.js";
import type { PruneWarning } from "./errors.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  SUCCESS = "SUCCESS",
  WARNING = "WARNING",
  ERROR = "ERROR",
}

export interface LogRecord {
  timestamp: Date;
  level: LogLevel;
  loggerName: string;
  message: string;
}

/**
 * Destination for rendered records beyond the console and the live file
 */
export interface LogRecordSink {
  save(record: LogRecord): void;
}

export interface LoggerOptions {
  name?: string;
  filePath?: string;
  timestampFormat?: string;
  level?: string;
  maxFileSizeBytes?: number;
  backupCount?: number;
  archiveDir?: string;
  formatter?: LogFormatter;
  recordSink?: LogRecordSink;
  onWarning?: (warning: PruneWarning) => void;
  clock?: () => Date;
}

export interface ResolvedLoggerConfig {
  name: string;
  filePath?: string;
  timestampFormat: string;
  minLevel: LogLevel;
  maxFileSizeBytes: number;
  backupCount: number;
  archiveDir?: string;
}

export interface ArchiveFile {
  path: string;
  fileName: string;
  /** Parsed from the file name, null when the name carries no stamp */
  creationTimestamp: Date | null;
  sourceBaseName: string;
}

export interface RotationResult {
  archive: ArchiveFile;
  pruned: string[];
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}
