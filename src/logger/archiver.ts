import { mkdirSync, readFileSync, readdirSync, rmSync, statSync, truncateSync, unlinkSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { gzipSync } from "node:zlib";
import { ArchiveIOError, errorCode, errorMessage, type PruneWarning } from "./errors.js";
import { formatTimestamp } from "./formatter.js";
import type { ArchiveFile } from "./types.js";

// ============================================
// ARCHIVER
// ============================================

const STAMP_FORMAT = "%Y%m%d_%H%M%S";
const ARCHIVE_EXTENSION = ".gz";
const STAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})(?:_(\d+))?\.gz$/;

export interface ArchiveListing extends ArchiveFile {
  modifiedAt: Date;
  size: number;
}

interface ParsedArchiveName {
  stamp: string;
  sequence: number;
  createdAt: Date;
}

/**
 * `<baseName>_<YYYYMMDD_HHMMSS>.gz`, with `_<sequence>` before the extension
 * when an earlier rotation already took that second.
 */
export function archiveFilenameFor(basePath: string, now: Date, sequence: number = 0): string {
  const stamp = formatTimestamp(now, STAMP_FORMAT);
  const suffix = sequence > 0 ? `_${sequence}` : "";
  return `${basename(basePath)}_${stamp}${suffix}${ARCHIVE_EXTENSION}`;
}

function parseArchiveName(fileName: string, baseName: string): ParsedArchiveName | null {
  const prefix = `${baseName}_`;
  if (!fileName.startsWith(prefix)) return null;

  const match = STAMP_PATTERN.exec(fileName.slice(prefix.length));
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds, sequence] = match;
  return {
    stamp: `${year}${month}${day}_${hours}${minutes}${seconds}`,
    sequence: sequence ? Number(sequence) : 0,
    createdAt: new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds)
    ),
  };
}

function toArchiveFile(path: string, baseName: string): ArchiveFile {
  const fileName = basename(path);
  return {
    path,
    fileName,
    creationTimestamp: parseArchiveName(fileName, baseName)?.createdAt ?? null,
    sourceBaseName: baseName,
  };
}

/**
 * Sequence for the next archive of this second: one past the highest taken,
 * so later rotations always sort after earlier ones.
 */
function nextSequence(archiveDir: string, baseName: string, now: Date): number {
  const stamp = formatTimestamp(now, STAMP_FORMAT);
  let next = 0;
  for (const fileName of readdirSync(archiveDir)) {
    const parsed = parseArchiveName(fileName, baseName);
    if (parsed?.stamp === stamp) {
      next = Math.max(next, parsed.sequence + 1);
    }
  }
  return next;
}

/**
 * Write the compressed bytes under the next name for this second.
 * Returns the path written.
 */
function writeArchive(archiveDir: string, liveFilePath: string, now: Date, data: Buffer): string {
  mkdirSync(archiveDir, { recursive: true });

  for (let sequence = nextSequence(archiveDir, basename(liveFilePath), now); ; sequence++) {
    const archivePath = join(archiveDir, archiveFilenameFor(liveFilePath, now, sequence));
    try {
      writeFileSync(archivePath, data, { flag: "wx" });
      return archivePath;
    } catch (error) {
      if (errorCode(error) === "EEXIST") continue;
      discardPartialArchive(archivePath);
      throw error;
    }
  }
}

function discardPartialArchive(archivePath: string): void {
  rmSync(archivePath, { force: true });
}

/**
 * Compress the live file into the archive directory, then truncate it in place.
 * Nothing is truncated unless the archive was written completely.
 */
export function rotate(liveFilePath: string, archiveDir: string, now: Date = new Date()): ArchiveFile {
  let content: Buffer;
  try {
    content = readFileSync(liveFilePath);
  } catch (error) {
    throw new ArchiveIOError(
      `Failed to read log file for rotation: ${errorMessage(error)}`,
      liveFilePath,
      { cause: error }
    );
  }

  let archivePath: string;
  try {
    archivePath = writeArchive(archiveDir, liveFilePath, now, gzipSync(content));
  } catch (error) {
    throw new ArchiveIOError(
      `Failed to write archive in ${archiveDir}: ${errorMessage(error)}`,
      archiveDir,
      { cause: error }
    );
  }

  try {
    truncateSync(liveFilePath, 0);
  } catch (error) {
    // The live file still holds everything; drop the copy so it is not archived twice
    discardPartialArchive(archivePath);
    throw new ArchiveIOError(
      `Failed to truncate log file after archiving: ${errorMessage(error)}`,
      liveFilePath,
      { cause: error }
    );
  }

  return toArchiveFile(archivePath, basename(liveFilePath));
}

function compareArchives(
  a: ArchiveListing & { parsed: ParsedArchiveName | null },
  b: ArchiveListing & { parsed: ParsedArchiveName | null }
): number {
  const byMtime = b.modifiedAt.getTime() - a.modifiedAt.getTime();
  if (byMtime !== 0) return byMtime;

  const stampA = a.parsed?.stamp ?? "";
  const stampB = b.parsed?.stamp ?? "";
  if (stampA !== stampB) return stampA < stampB ? 1 : -1;

  const bySequence = (b.parsed?.sequence ?? 0) - (a.parsed?.sequence ?? 0);
  if (bySequence !== 0) return bySequence;

  if (a.fileName === b.fileName) return 0;
  return a.fileName < b.fileName ? 1 : -1;
}

/**
 * Archives belonging to a log base name, newest first.
 * Ordered by modification time, then the filename stamp and sequence.
 */
export function listArchives(archiveDir: string, baseName: string): ArchiveListing[] {
  const entries = readdirSync(archiveDir)
    .filter((fileName) => fileName.startsWith(baseName) && fileName.endsWith(ARCHIVE_EXTENSION))
    .flatMap((fileName) => {
      const path = join(archiveDir, fileName);
      const stats = statSync(path, { throwIfNoEntry: false });
      if (!stats) return [];
      return [
        {
          ...toArchiveFile(path, baseName),
          modifiedAt: stats.mtime,
          size: stats.size,
          parsed: parseArchiveName(fileName, baseName),
        },
      ];
    });

  return entries.sort(compareArchives).map(({ parsed: _parsed, ...listing }) => listing);
}

/**
 * Keep the `backupCount` newest archives of `baseName`, remove the rest.
 * Failures are reported through `onWarning` and never thrown.
 */
export function prune(
  archiveDir: string,
  baseName: string,
  backupCount: number,
  onWarning?: (warning: PruneWarning) => void
): string[] {
  let archives: ArchiveListing[];
  try {
    archives = listArchives(archiveDir, baseName);
  } catch (error) {
    onWarning?.({
      path: archiveDir,
      message: `Error listing archives in ${archiveDir}: ${errorMessage(error)}`,
      cause: error,
    });
    return [];
  }

  const removed: string[] = [];
  for (const archive of archives.slice(Math.max(0, backupCount))) {
    try {
      unlinkSync(archive.path);
      removed.push(archive.path);
    } catch (error) {
      onWarning?.({
        path: archive.path,
        message: `Error removing old archive ${archive.path}: ${errorMessage(error)}`,
        cause: error,
      });
    }
  }

  return removed;
}
