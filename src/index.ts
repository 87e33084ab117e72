// ============================================
// PACKAGE EXPORTS
// ============================================
export * from "./logger/index.js";
export * from "./records/index.js";
export {
  DEFAULT_BACKUP_COUNT,
  DEFAULT_LEVEL,
  DEFAULT_LOGGER_NAME,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  defaultArchiveDir,
  loggerOptionsSchema,
  resolveLoggerConfig,
} from "./config/logger-config.js";
export {
  loadArchiveTargetFromEnv,
  loadDotEnv,
  loadLoggerOptionsFromEnv,
  parseSizeToBytes,
} from "./config/config.js";
export type { ArchiveTargetOptions } from "./config/config.js";
export { createAdminProgram } from "./cli/program.js";
export type { AdminProgramIO } from "./cli/program.js";
