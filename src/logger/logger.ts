import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { resolveLoggerConfig } from "../config/logger-config.js";
import { ArchiveIOError, errorMessage, WriteIOError, type PruneWarning } from "./errors.js";
import { LogFileWriter } from "./file-writer.js";
import { LogFormatter } from "./formatter.js";
import { parseLogLevel, shouldLog } from "./levels.js";
import {
  LogLevel,
  type LogRecord,
  type LogRecordSink,
  type Logger,
  type LoggerOptions,
  type ResolvedLoggerConfig,
  type RotationResult,
} from "./types.js";

// ============================================
// LEVELED ROTATING LOGGER
// ============================================

/**
 * Console + file logger with size-based rotation.
 *
 * Every call runs synchronously on the caller's thread: the rotation check and
 * the append of one record complete before any other call on this logger can
 * start, so two calls never both archive the same content.
 */
export class ModelLogger implements Logger {
  private config: ResolvedLoggerConfig;
  private fileWriter: LogFileWriter;
  private formatter: LogFormatter;
  private recordSink: LogRecordSink | undefined;
  private onWarning: (warning: PruneWarning) => void;
  private clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.config = resolveLoggerConfig(options);
    this.formatter = options.formatter ?? new LogFormatter();
    this.recordSink = options.recordSink;
    this.clock = options.clock ?? (() => new Date());
    this.onWarning = options.onWarning ?? ((warning) => this.reportWarning(warning));

    this.prepareDirectories();
    this.fileWriter = new LogFileWriter(this.config);
  }

  /**
   * Create the archive directory (and the log file's directory) up front
   */
  private prepareDirectories(): void {
    const { filePath, archiveDir } = this.config;
    if (!filePath || !archiveDir) return;

    try {
      mkdirSync(archiveDir, { recursive: true });
    } catch (error) {
      throw new ArchiveIOError(
        `Failed to create archive directory: ${errorMessage(error)}`,
        archiveDir,
        { cause: error }
      );
    }

    const logDir = dirname(filePath);
    try {
      mkdirSync(logDir, { recursive: true });
    } catch (error) {
      throw new WriteIOError(`Failed to create log directory: ${errorMessage(error)}`, logDir, {
        cause: error,
      });
    }
  }

  private reportWarning(warning: PruneWarning): void {
    const record: LogRecord = {
      timestamp: this.clock(),
      level: LogLevel.WARNING,
      loggerName: this.config.name,
      message: warning.message,
    };
    console.warn(this.formatter.renderColored(record, this.config.timestampFormat));
  }

  private writeConsole(level: LogLevel, line: string): void {
    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARNING:
        console.warn(line);
        break;
      default:
        console.log(line);
        break;
    }
  }

  /**
   * Log a message at the given level.
   * The console line is printed before any file work; file errors are thrown after it.
   */
  log(level: LogLevel, message: string): void {
    if (!shouldLog(this.config.minLevel, level)) return;

    const now = this.clock();
    const record: LogRecord = {
      timestamp: now,
      level,
      loggerName: this.config.name,
      message,
    };

    const plainLine = this.formatter.renderPlain(record, this.config.timestampFormat);
    this.writeConsole(level, this.formatter.colorize(level, plainLine));

    this.fileWriter.append(plainLine, { now, onWarning: this.onWarning });
    this.recordSink?.save(record);
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.log(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  /**
   * Change the minimum level; an unknown name leaves the current level in place
   */
  setLevel(level: string): void {
    this.config.minLevel = parseLogLevel(level);
  }

  getLevel(): LogLevel {
    return this.config.minLevel;
  }

  getConfig(): Readonly<ResolvedLoggerConfig> {
    return { ...this.config };
  }

  /**
   * Rotation performed by the most recent file append, if any
   */
  getLastRotation(): RotationResult | null {
    return this.fileWriter.getLastRotation();
  }
}

// ============================================
// LOGGER FACTORY
// ============================================
let defaultLogger: ModelLogger | null = null;

export function createLogger(options?: LoggerOptions): ModelLogger {
  return new ModelLogger(options);
}

export function getDefaultLogger(): ModelLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: ModelLogger): void {
  defaultLogger = logger;
}
