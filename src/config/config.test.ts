import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InvalidLevelError, LoggerConfigError } from "../logger/errors.js";
import { LogLevel } from "../logger/types.js";
import {
  loadArchiveTargetFromEnv,
  loadDotEnv,
  loadLoggerOptionsFromEnv,
  parseSizeToBytes,
} from "./config.js";
import { defaultArchiveDir, resolveLoggerConfig } from "./logger-config.js";

describe("resolveLoggerConfig", () => {
  it("fills in defaults", () => {
    expect(resolveLoggerConfig()).toEqual({
      name: "ModelLogger",
      filePath: undefined,
      timestampFormat: "%Y-%m-%d %H:%M:%S",
      minLevel: LogLevel.INFO,
      maxFileSizeBytes: 10485760,
      backupCount: 5,
      archiveDir: undefined,
    });
  });

  it("derives the archive directory from the log file", () => {
    const config = resolveLoggerConfig({ filePath: "logs/app.log" });
    expect(config.archiveDir).toBe(join(dirname(resolve("logs/app.log")), "logs", "archive"));
    expect(defaultArchiveDir("/srv/app/app.log")).toBe(join("/srv/app", "logs", "archive"));
  });

  it("keeps an explicit archive directory", () => {
    const config = resolveLoggerConfig({ filePath: "/srv/app.log", archiveDir: "/backups" });
    expect(config.archiveDir).toBe("/backups");
  });

  it("treats an empty name as the default name", () => {
    expect(resolveLoggerConfig({ name: "" }).name).toBe("ModelLogger");
  });

  it("accepts levels in any case", () => {
    expect(resolveLoggerConfig({ level: "success" }).minLevel).toBe(LogLevel.SUCCESS);
  });

  it("reports an unknown level before other problems", () => {
    expect(() => resolveLoggerConfig({ level: "nope", maxFileSizeBytes: -1 })).toThrow(
      InvalidLevelError
    );
  });

  it("rejects non-positive or fractional sizes and negative backup counts", () => {
    expect(() => resolveLoggerConfig({ maxFileSizeBytes: 0 })).toThrow(LoggerConfigError);
    expect(() => resolveLoggerConfig({ maxFileSizeBytes: 1.5 })).toThrow(LoggerConfigError);
    expect(() => resolveLoggerConfig({ backupCount: -1 })).toThrow("Invalid logger options");
    expect(resolveLoggerConfig({ backupCount: 0 }).backupCount).toBe(0);
  });
});

describe("parseSizeToBytes", () => {
  it("parses plain and suffixed sizes", () => {
    expect(parseSizeToBytes("512")).toBe(512);
    expect(parseSizeToBytes("2KB")).toBe(2048);
    expect(parseSizeToBytes("1.5kb")).toBe(1536);
    expect(parseSizeToBytes("10MB")).toBe(10485760);
    expect(parseSizeToBytes("1 gb")).toBe(1073741824);
  });

  it("rejects malformed sizes", () => {
    expect(() => parseSizeToBytes("ten")).toThrow(LoggerConfigError);
  });
});

describe("loadLoggerOptionsFromEnv", () => {
  it("returns no options for an empty environment", () => {
    expect(loadLoggerOptionsFromEnv({})).toEqual({});
  });

  it("maps LOG_* variables to options", () => {
    expect(
      loadLoggerOptionsFromEnv({
        LOG_NAME: "api",
        LOG_FILE: "/var/log/api.log",
        LOG_LEVEL: "debug",
        LOG_TIMESTAMP_FORMAT: "%H:%M:%S",
        LOG_MAX_FILE_SIZE: "2KB",
        LOG_BACKUP_COUNT: "3",
        LOG_ARCHIVE_DIR: "/var/log/archive",
        UNRELATED: "x",
      })
    ).toEqual({
      name: "api",
      filePath: "/var/log/api.log",
      level: "debug",
      timestampFormat: "%H:%M:%S",
      maxFileSizeBytes: 2048,
      backupCount: 3,
      archiveDir: "/var/log/archive",
    });
  });

  it("ignores blank values", () => {
    expect(loadLoggerOptionsFromEnv({ LOG_FILE: "  ", LOG_BACKUP_COUNT: "" })).toEqual({});
  });

  it("rejects a non-integer backup count", () => {
    expect(() => loadLoggerOptionsFromEnv({ LOG_BACKUP_COUNT: "many" })).toThrow(LoggerConfigError);
  });
});

describe("loadArchiveTargetFromEnv", () => {
  it("reads only the log file and archive directory", () => {
    expect(
      loadArchiveTargetFromEnv({
        LOG_FILE: "/var/log/api.log",
        LOG_ARCHIVE_DIR: "/var/log/archive",
        LOG_MAX_FILE_SIZE: "huge",
        LOG_BACKUP_COUNT: "many",
      })
    ).toEqual({ filePath: "/var/log/api.log", archiveDir: "/var/log/archive" });
  });
});

describe("loadDotEnv", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    delete process.env["MODEL_LOGGER_TEST_VALUE"];
  });

  it("returns false when there is no file", () => {
    expect(loadDotEnv(join(tmpdir(), "model-logger-missing", ".env"))).toBe(false);
  });

  it("loads variables from the file", () => {
    dir = mkdtempSync(join(tmpdir(), "model-logger-env-"));
    writeFileSync(join(dir, ".env"), "MODEL_LOGGER_TEST_VALUE=loaded\n");

    expect(loadDotEnv(join(dir, ".env"))).toBe(true);
    expect(process.env["MODEL_LOGGER_TEST_VALUE"]).toBe("loaded");
  });
});
