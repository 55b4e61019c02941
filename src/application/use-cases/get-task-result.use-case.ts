import { ConversionTask } from "../../domain/entities/conversion-task";
import { NotFoundError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { MediaStorage } from "../../infrastructure/storage/media.storage";

export interface TaskOutputFile {
  path: string;
  url: string;
  size: number;
}

export interface TaskResult {
  task: ConversionTask;
  output: TaskOutputFile | null; // Set only for done tasks whose file still exists
}

export class GetTaskResultUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private storage: MediaStorage
  ) {}

  async execute(params: { taskId: string }): Promise<TaskResult> {
    const task = await this.taskRepository.findById(params.taskId);
    if (!task) {
      throw new NotFoundError("Task not found");
    }
    if (task.status !== "done" || !task.outputPath) {
      return { task, output: null };
    }

    const size = await this.storage.fileSize(task.outputPath);
    if (size === null) {
      return { task, output: null };
    }
    return { task, output: { path: task.outputPath, url: this.storage.urlFor(task.outputPath), size } };
  }
}
