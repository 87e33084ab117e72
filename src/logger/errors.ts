// ============================================
// LOGGER ERRORS
// ============================================

export class LoggerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoggerError";
    this.code = code;
  }
}

export class InvalidLevelError extends LoggerError {
  readonly level: string;

  constructor(level: string, validLevels: readonly string[]) {
    super(`Invalid log level "${level}". Choose from ${validLevels.join(", ")}`, "INVALID_LEVEL");
    this.name = "InvalidLevelError";
    this.level = level;
  }
}

export class LoggerConfigError extends LoggerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_CONFIG", options);
    this.name = "LoggerConfigError";
  }
}

/**
 * Rotation could not read the live file or write the archive.
 * The live file is left as it was before the rotation attempt.
 */
export class ArchiveIOError extends LoggerError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, "ARCHIVE_IO", options);
    this.name = "ArchiveIOError";
    this.path = path;
  }
}

export class WriteIOError extends LoggerError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, "WRITE_IO", options);
    this.name = "WriteIOError";
    this.path = path;
  }
}

/**
 * Reported (never thrown) when an old archive could not be removed
 */
export interface PruneWarning {
  path: string;
  message: string;
  cause: unknown;
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

export function errorCode(value: unknown): string | undefined {
  if (value && typeof value === "object" && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}
