import { appendFileSync } from "node:fs";
import { errorMessage, WriteIOError } from "./errors.js";
import { checkAndRotate, type RotationGateOptions } from "./rotation-gate.js";
import type { ResolvedLoggerConfig, RotationResult } from "./types.js";

// ============================================
// FILE WRITER FOR LOGS
// ============================================
export class LogFileWriter {
  private config: ResolvedLoggerConfig;
  private lastRotation: RotationResult | null = null;

  constructor(config: ResolvedLoggerConfig) {
    this.config = config;
  }

  /**
   * Rotation that happened during the most recent append, if any
   */
  getLastRotation(): RotationResult | null {
    return this.lastRotation;
  }

  /**
   * Append one rendered record to the live file.
   * Rotation is checked before the write, so the record that crosses the
   * threshold stays in the live file until the next append.
   */
  append(record: string, options: RotationGateOptions = {}): void {
    const { filePath } = this.config;
    if (!filePath) {
      return; // Console-only mode
    }

    this.lastRotation = checkAndRotate(this.config, options);

    try {
      appendFileSync(filePath, `${record}\n`);
    } catch (error) {
      throw new WriteIOError(`Failed to append to log file: ${errorMessage(error)}`, filePath, {
        cause: error,
      });
    }
  }
}
