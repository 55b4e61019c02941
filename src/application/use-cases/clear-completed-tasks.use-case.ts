import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { removeTaskFiles } from "../services/task-job.helpers";

const COMPLETED_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export class ClearCompletedTasksUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private storage: MediaStorage
  ) {}

  async execute(params: { now?: Date } = {}): Promise<{ deletedCount: number }> {
    const now = params.now ?? new Date();
    const tasks = await this.taskRepository.findCompletedBefore(["done"], new Date(now.getTime() - COMPLETED_MAX_AGE_MS));

    let deletedCount = 0;
    for (const task of tasks) {
      try {
        await removeTaskFiles(this.storage, task);
        if (await this.taskRepository.delete(task.id)) {
          deletedCount++;
        }
      } catch (error: unknown) {
        console.error(`[ClearCompletedTasks] Failed to delete task ${task.id}: ${errorMessage(error)}`);
      }
    }

    console.log(`[ClearCompletedTasks] Deleted ${deletedCount} completed task(s)`);
    return { deletedCount };
  }
}
