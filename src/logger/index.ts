// ============================================
// LOGGER MODULE EXPORTS
// ============================================
export { ModelLogger, createLogger, getDefaultLogger, setDefaultLogger } from "./logger.js";
export { LogFileWriter } from "./file-writer.js";
export { LogFormatter, DEFAULT_TIMESTAMP_FORMAT, formatTimestamp } from "./formatter.js";
export type { LogFormatterOptions } from "./formatter.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, parseLogLevel, shouldLog } from "./levels.js";
export { archiveFilenameFor, listArchives, prune, rotate } from "./archiver.js";
export type { ArchiveListing } from "./archiver.js";
export { checkAndRotate } from "./rotation-gate.js";
export type { RotationGateOptions } from "./rotation-gate.js";
export {
  ArchiveIOError,
  InvalidLevelError,
  LoggerConfigError,
  LoggerError,
  WriteIOError,
} from "./errors.js";
export type { PruneWarning } from "./errors.js";
export { LogLevel } from "./types.js";
export type {
  ArchiveFile,
  Logger,
  LoggerOptions,
  LogRecord,
  LogRecordSink,
  ResolvedLoggerConfig,
  RotationResult,
} from "./types.js";
