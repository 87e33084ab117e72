import { Chalk, type ChalkInstance, type ColorSupportLevel } from "chalk";
import { LogLevel, type LogRecord } from "./types.js";

// ============================================
// RECORD FORMATTING
// ============================================

export const DEFAULT_TIMESTAMP_FORMAT = "%Y-%m-%d %H:%M:%S";

/** Width the level column is padded to */
const LEVEL_WIDTH = 8;

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/** Counted on calendar dates so DST shifts cannot move the result */
function dayOfYear(date: Date): number {
  const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  const start = Date.UTC(date.getFullYear(), 0, 1);
  return Math.round((today - start) / (24 * 60 * 60 * 1000)) + 1;
}

function utcOffset(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const abs = Math.abs(offset);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * Render a date (local time) with strftime-style directives.
 * Unknown directives are emitted verbatim.
 */
export function formatTimestamp(date: Date, format: string): string {
  return format.replace(/%([a-zA-Z%])/g, (directive, code: string) => {
    switch (code) {
      case "Y":
        return String(date.getFullYear());
      case "y":
        return pad(date.getFullYear() % 100);
      case "m":
        return pad(date.getMonth() + 1);
      case "d":
        return pad(date.getDate());
      case "H":
        return pad(date.getHours());
      case "I":
        return pad(date.getHours() % 12 === 0 ? 12 : date.getHours() % 12);
      case "M":
        return pad(date.getMinutes());
      case "S":
        return pad(date.getSeconds());
      case "f":
        return pad(date.getMilliseconds() * 1000, 6);
      case "p":
        return date.getHours() < 12 ? "AM" : "PM";
      case "j":
        return pad(dayOfYear(date), 3);
      case "a":
        return WEEKDAYS[date.getDay()].slice(0, 3);
      case "A":
        return WEEKDAYS[date.getDay()];
      case "b":
        return MONTHS[date.getMonth()].slice(0, 3);
      case "B":
        return MONTHS[date.getMonth()];
      case "z":
        return utcOffset(date);
      case "%":
        return "%";
      default:
        return directive;
    }
  });
}

export interface LogFormatterOptions {
  /** Force a chalk color level; auto-detected from the terminal when omitted */
  colorLevel?: ColorSupportLevel;
}

/**
 * Owns the console color state. Built once and shared by the loggers that use it.
 */
export class LogFormatter {
  private chalk: ChalkInstance;
  private levelColors: Record<LogLevel, ChalkInstance>;

  constructor(options: LogFormatterOptions = {}) {
    this.chalk =
      options.colorLevel === undefined ? new Chalk() : new Chalk({ level: options.colorLevel });
    this.levelColors = {
      [LogLevel.DEBUG]: this.chalk.magenta,
      [LogLevel.INFO]: this.chalk.blue,
      [LogLevel.SUCCESS]: this.chalk.green,
      [LogLevel.WARNING]: this.chalk.yellow,
      [LogLevel.ERROR]: this.chalk.red,
    };
  }

  /**
   * Plain line as written to the log file:
   * `[<timestamp>] <LEVEL padded to 8> <loggerName>: <message>`
   */
  renderPlain(record: LogRecord, timestampFormat: string): string {
    const format = timestampFormat || DEFAULT_TIMESTAMP_FORMAT;
    const timestamp = formatTimestamp(record.timestamp, format);
    const level = record.level.padEnd(LEVEL_WIDTH);
    return `[${timestamp}] ${level} ${record.loggerName}: ${record.message}`;
  }

  colorize(level: LogLevel, text: string): string {
    return this.levelColors[level](text);
  }

  renderColored(record: LogRecord, timestampFormat: string): string {
    return this.colorize(record.level, this.renderPlain(record, timestampFormat));
  }
}
