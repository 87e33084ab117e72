import { statSync } from "node:fs";
import { basename } from "node:path";
import { prune, rotate } from "./archiver.js";
import { ArchiveIOError, errorMessage, type PruneWarning } from "./errors.js";
import type { ResolvedLoggerConfig, RotationResult } from "./types.js";

// ============================================
// ROTATION GATE
// ============================================

export interface RotationGateOptions {
  now?: Date;
  onWarning?: (warning: PruneWarning) => void;
}

/**
 * Rotate the live file when it has reached `maxFileSizeBytes`.
 * Runs before every append; returns null when nothing was rotated.
 */
export function checkAndRotate(
  config: ResolvedLoggerConfig,
  options: RotationGateOptions = {}
): RotationResult | null {
  const { filePath, archiveDir } = config;
  if (!filePath || !archiveDir) return null;

  let size: number;
  try {
    const stats = statSync(filePath, { throwIfNoEntry: false });
    if (!stats) return null;
    size = stats.size;
  } catch (error) {
    throw new ArchiveIOError(`Failed to inspect log file: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }

  if (size < config.maxFileSizeBytes) return null;

  const archive = rotate(filePath, archiveDir, options.now ?? new Date());
  const pruned = prune(archiveDir, basename(filePath), config.backupCount, options.onWarning);

  return { archive, pruned };
}
