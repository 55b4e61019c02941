import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { MediaArea, MediaStorage } from "../../infrastructure/storage/media.storage";
import { removeTaskFiles } from "../services/task-job.helpers";
import { CleanupTempFilesResult, CleanupTempFilesUseCase } from "./cleanup-temp-files.use-case";

export interface CleanupOldFilesSettings {
  tempMaxAgeHours: number;
  taskRetentionDays: number;
}

export interface CleanupOldFilesResult {
  status: "completed";
  cleanupTasks: Record<MediaArea, CleanupTempFilesResult>;
  deletedTasks: number;
  timestamp: string;
}

/** Periodic maintenance: stale media files and expired finished tasks. */
export class CleanupOldFilesUseCase {
  constructor(
    private cleanupTempFiles: CleanupTempFilesUseCase,
    private taskRepository: IConversionTaskRepository,
    private storage: MediaStorage,
    private settings: CleanupOldFilesSettings
  ) {}

  async execute(params: { now?: Date } = {}): Promise<CleanupOldFilesResult> {
    const now = params.now ?? new Date();

    const sweep = (area: MediaArea) =>
      this.cleanupTempFiles.execute({
        directory: this.storage.dir(area),
        maxAgeHours: this.settings.tempMaxAgeHours,
        now,
      });
    const cleanupTasks: Record<MediaArea, CleanupTempFilesResult> = {
      temp: await sweep("temp"),
      uploads: await sweep("uploads"),
      outputs: await sweep("outputs"),
      results: await sweep("results"),
    };

    const retentionCutoff = new Date(now.getTime() - this.settings.taskRetentionDays * 24 * 60 * 60 * 1000);
    const expired = await this.taskRepository.findCompletedBefore(["done", "failed"], retentionCutoff);
    let deletedTasks = 0;
    for (const task of expired) {
      try {
        await removeTaskFiles(this.storage, task);
        if (await this.taskRepository.delete(task.id)) {
          deletedTasks++;
        }
      } catch (error: unknown) {
        console.error(`[CleanupOldFiles] Failed to delete task ${task.id}: ${errorMessage(error)}`);
      }
    }

    console.log(`[CleanupOldFiles] Deleted ${deletedTasks} expired task(s)`);
    return { status: "completed", cleanupTasks, deletedTasks, timestamp: now.toISOString() };
  }
}
