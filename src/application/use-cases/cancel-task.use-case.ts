import { ConversionTask } from "../../domain/entities/conversion-task";
import { NotFoundError, TaskStateError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { ITaskQueue } from "../../domain/interfaces/itask.queue";
import { isFinished } from "../../domain/utils/conversion-task.state";
import { TaskProgressService } from "../services/task-progress.service";

export const CANCELLED_MESSAGE = "Task cancelled";

export class CancelTaskUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskQueue: ITaskQueue,
    private taskProgress: TaskProgressService
  ) {}

  async execute(params: { taskId: string }): Promise<ConversionTask> {
    const task = await this.taskRepository.findById(params.taskId);
    if (!task) {
      throw new NotFoundError("Task not found");
    }
    if (isFinished(task)) {
      throw new TaskStateError(`Task is already finished (status: ${task.status})`);
    }

    if (task.queueJobId) {
      const revoked = await this.taskQueue.revoke(task.queueJobId);
      console.log(`[CancelTask] Job ${task.queueJobId} ${revoked ? "revoked" : "was not pending or active"}`);
    }

    const failed = await this.taskProgress.fail(task.id, CANCELLED_MESSAGE);
    if (!failed) {
      // The worker finished it between the read and the write
      throw new TaskStateError("Task finished before it could be cancelled");
    }
    return failed;
  }
}
