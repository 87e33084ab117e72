import { basename } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { loadArchiveTargetFromEnv } from "../config/config.js";
import { resolveLoggerConfig } from "../config/logger-config.js";
import { listArchives, prune } from "../logger/archiver.js";
import { LoggerConfigError } from "../logger/errors.js";

// ============================================
// LOG ADMIN COMMANDS
// ============================================

export interface AdminProgramIO {
  print: (line: string) => void;
  env: Record<string, string | undefined>;
}

interface ArchiveTargetFlags {
  file?: string;
  archiveDir?: string;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Resolve the live log file and its archive directory from flags, falling back to LOG_FILE and LOG_ARCHIVE_DIR
 */
function resolveArchiveTarget(
  opts: ArchiveTargetFlags,
  env: AdminProgramIO["env"]
): { filePath: string; archiveDir: string } {
  const envOptions = loadArchiveTargetFromEnv(env);
  const config = resolveLoggerConfig({
    filePath: opts.file ?? envOptions.filePath,
    archiveDir: opts.archiveDir ?? envOptions.archiveDir,
  });
  if (!config.filePath || !config.archiveDir) {
    throw new LoggerConfigError("No log file given: pass --file or set LOG_FILE");
  }
  return { filePath: config.filePath, archiveDir: config.archiveDir };
}

export function createAdminProgram(io: Partial<AdminProgramIO> = {}): Command {
  const print = io.print ?? ((line: string) => console.log(line));
  const env = io.env ?? process.env;

  const program = new Command("log-admin").description(
    "Inspect and prune rotated log archives"
  );

  program
    .command("archives")
    .description("List gzip archives of a log file, newest first")
    .option("--file <path>", "Live log file")
    .option("--archive-dir <dir>", "Archive directory")
    .action((opts: ArchiveTargetFlags) => {
      const { filePath, archiveDir } = resolveArchiveTarget(opts, env);
      const archives = listArchives(archiveDir, basename(filePath));

      if (archives.length === 0) {
        print(`No archives found in ${archiveDir}`);
        return;
      }
      for (const archive of archives) {
        print(`${archive.fileName}\t${archive.size} bytes\t${archive.modifiedAt.toISOString()}`);
      }
      print(`Total: ${archives.length} archives`);
    });

  program
    .command("prune")
    .description("Remove archives beyond the newest <n>")
    .requiredOption("--backup-count <n>", "Archives to keep", parseInteger)
    .option("--file <path>", "Live log file")
    .option("--archive-dir <dir>", "Archive directory")
    .action((opts: ArchiveTargetFlags & { backupCount: number }) => {
      const { filePath, archiveDir } = resolveArchiveTarget(opts, env);
      const removed = prune(archiveDir, basename(filePath), opts.backupCount, (warning) => {
        print(`Warning: ${warning.message}`);
      });

      for (const path of removed) {
        print(`Removed ${path}`);
      }
      print(`Removed ${removed.length} archives`);
    });

  return program;
}
