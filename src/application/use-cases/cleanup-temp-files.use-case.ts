import { readdir, rmdir, stat, unlink } from "fs/promises";
import { join } from "path";
import { errorMessage } from "../../domain/errors/app.error";

export interface CleanupTempFilesParams {
  directory: string;
  maxAgeHours: number;
  now?: Date;
}

export type CleanupTempFilesResult =
  | {
      status: "success";
      deletedFiles: number;
      deletedDirs: number;
      freedSpaceMb: number;
      directory: string;
    }
  | { status: "skipped"; reason: string; directory: string };

interface SweepTotals {
  files: number;
  dirs: number;
  bytes: number;
}

/**
 * Deletes files older than the age threshold under a directory, then any
 * subdirectory left empty whose own mtime is also past the threshold. A
 * fresh work directory survives even while it is still empty. The directory
 * itself is kept.
 */
export class CleanupTempFilesUseCase {
  async execute(params: CleanupTempFilesParams): Promise<CleanupTempFilesResult> {
    const { directory } = params;
    try {
      const info = await stat(directory);
      if (!info.isDirectory()) {
        return { status: "skipped", reason: "Not a directory", directory };
      }
    } catch {
      return { status: "skipped", reason: "Directory does not exist", directory };
    }

    const cutoff = (params.now ?? new Date()).getTime() - params.maxAgeHours * 60 * 60 * 1000;
    const totals: SweepTotals = { files: 0, dirs: 0, bytes: 0 };
    await this.sweep(directory, cutoff, totals);

    const freedSpaceMb = Math.round((totals.bytes / (1024 * 1024)) * 100) / 100;
    console.log(`[CleanupTempFiles] ${directory}: removed ${totals.files} file(s), ${totals.dirs} dir(s), ${freedSpaceMb} MB`);
    return { status: "success", deletedFiles: totals.files, deletedDirs: totals.dirs, freedSpaceMb, directory };
  }

  /** Returns true when `dir` is empty after the sweep. */
  private async sweep(dir: string, cutoff: number, totals: SweepTotals): Promise<boolean> {
    const entries = await readdir(dir, { withFileTypes: true });
    let remaining = entries.length;

    for (const entry of entries) {
      const path = join(dir, entry.name);
      try {
        if (entry.isDirectory()) {
          // mtime before the sweep; deleting children bumps it
          const dirInfo = await stat(path);
          const empty = await this.sweep(path, cutoff, totals);
          if (empty && dirInfo.mtimeMs < cutoff) {
            await rmdir(path);
            totals.dirs++;
            remaining--;
          }
          continue;
        }
        const info = await stat(path);
        if (info.mtimeMs < cutoff) {
          await unlink(path);
          totals.files++;
          totals.bytes += info.size;
          remaining--;
        }
      } catch (error: unknown) {
        console.warn(`[CleanupTempFiles] Could not clean ${path}: ${errorMessage(error)}`);
      }
    }
    return remaining === 0;
  }
}
