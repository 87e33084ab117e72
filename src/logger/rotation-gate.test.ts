import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveIOError } from "./errors.js";
import { checkAndRotate } from "./rotation-gate.js";
import { LogLevel, type ResolvedLoggerConfig } from "./types.js";

describe("checkAndRotate", () => {
  let dir: string;
  let config: ResolvedLoggerConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "model-logger-gate-"));
    config = {
      name: "gate",
      filePath: join(dir, "app.log"),
      timestampFormat: "%Y-%m-%d %H:%M:%S",
      minLevel: LogLevel.INFO,
      maxFileSizeBytes: 10,
      backupCount: 2,
      archiveDir: join(dir, "archive"),
    };
    mkdirSync(join(dir, "archive"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("does nothing without a file path", () => {
    expect(checkAndRotate({ ...config, filePath: undefined })).toBeNull();
  });

  it("does nothing when the live file does not exist yet", () => {
    expect(checkAndRotate(config)).toBeNull();
    expect(readdirSync(join(dir, "archive"))).toEqual([]);
  });

  it("leaves a file below the threshold alone", () => {
    writeFileSync(join(dir, "app.log"), "123456789");

    expect(checkAndRotate(config)).toBeNull();
    expect(readFileSync(join(dir, "app.log"), "utf8")).toBe("123456789");
  });

  it("rotates once the size reaches the threshold", () => {
    writeFileSync(join(dir, "app.log"), "1234567890");

    const result = checkAndRotate(config, { now: new Date(2026, 9, 19, 14, 3, 9) });

    expect(result?.archive.fileName).toBe("app.log_20261019_140309.gz");
    expect(result?.pruned).toEqual([]);
    expect(readFileSync(join(dir, "app.log"), "utf8")).toBe("");
    expect(
      gunzipSync(readFileSync(join(dir, "archive", "app.log_20261019_140309.gz"))).toString("utf8")
    ).toBe("1234567890");
  });

  it("never keeps more than backupCount archives", () => {
    for (let second = 0; second < 6; second++) {
      writeFileSync(join(dir, "app.log"), `rotation ${second}`);
      checkAndRotate(config, { now: new Date(2026, 9, 19, 14, 0, second) });
      expect(readdirSync(join(dir, "archive")).length).toBeLessThanOrEqual(2);
    }

    expect(readdirSync(join(dir, "archive")).sort()).toEqual([
      "app.log_20261019_140004.gz",
      "app.log_20261019_140005.gz",
    ]);
  });

  it("propagates rotation failures and keeps the live file", () => {
    writeFileSync(join(dir, "blocked"), "");
    writeFileSync(join(dir, "app.log"), "1234567890");

    expect(() => checkAndRotate({ ...config, archiveDir: join(dir, "blocked") })).toThrow(
      ArchiveIOError
    );
    expect(readFileSync(join(dir, "app.log"), "utf8")).toBe("1234567890");
  });
});
