import { ConversionTask, NewConversionTask } from "../../domain/entities/conversion-task";
import { JobName } from "../../domain/enums/queue.name";
import { TaskKind } from "../../domain/enums/task.kind";
import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { ITaskQueue } from "../../domain/interfaces/itask.queue";
import { TaskProgressService } from "../services/task-progress.service";

const JOBS_BY_KIND: Record<TaskKind, JobName> = {
  conversion: "conversion.run",
  audio_to_text: "audio.transcribe",
  images_to_gif: "images.gif",
};

/**
 * Stores a task and puts its job on the queue. A task whose job cannot be
 * enqueued is failed straight away so it never sits in `queued` forever.
 */
export class CreateConversionTaskUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskQueue: ITaskQueue,
    private taskProgress: TaskProgressService
  ) {}

  async execute(input: NewConversionTask): Promise<ConversionTask> {
    const task = await this.taskRepository.create(input);

    try {
      const job = await this.taskQueue.enqueue(JOBS_BY_KIND[task.kind], { taskId: task.id });
      const updated = await this.taskRepository.update(task.id, { queueJobId: job.id });
      console.log(`[CreateConversionTask] Task ${task.id} (${task.kind}) queued as job ${job.id}`);
      return updated ?? { ...task, queueJobId: job.id };
    } catch (error: unknown) {
      console.error(`[CreateConversionTask] Failed to enqueue task ${task.id}:`, error);
      await this.taskProgress.fail(task.id, `Failed to queue task: ${errorMessage(error)}`);
      throw error;
    }
  }
}
