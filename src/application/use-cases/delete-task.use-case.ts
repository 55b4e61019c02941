import { NotFoundError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { ITaskQueue } from "../../domain/interfaces/itask.queue";
import { isActive } from "../../domain/utils/conversion-task.state";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { removeTaskFiles } from "../services/task-job.helpers";

export interface DeleteTaskUseCaseParams {
  taskId: string;
}

export class DeleteTaskUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskQueue: ITaskQueue,
    private storage: MediaStorage
  ) {}

  async execute(params: DeleteTaskUseCaseParams): Promise<void> {
    const { taskId } = params;

    const task = await this.taskRepository.findById(taskId);
    if (!task) {
      throw new NotFoundError("Task not found");
    }

    // Stop the worker first so it does not write files we are about to remove
    if (isActive(task) && task.queueJobId) {
      await this.taskQueue.revoke(task.queueJobId);
    }

    await removeTaskFiles(this.storage, task);

    await this.taskRepository.delete(taskId);
    console.log(`[DeleteTask] Deleted task ${taskId}`);
  }
}
