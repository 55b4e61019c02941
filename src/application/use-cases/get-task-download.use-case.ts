import { NotFoundError, TaskStateError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { contentTypeFor, downloadFilename } from "../../domain/utils/file.naming";
import { MediaStorage } from "../../infrastructure/storage/media.storage";

export interface TaskDownload {
  path: string;
  filename: string;
  contentType: string;
}

export class GetTaskDownloadUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private storage: MediaStorage
  ) {}

  async execute(params: { taskId: string }): Promise<TaskDownload> {
    const task = await this.taskRepository.findById(params.taskId);
    if (!task) {
      throw new NotFoundError("Task not found");
    }
    if (task.status !== "done") {
      throw new TaskStateError(`Task is not completed (status: ${task.status})`);
    }
    if (!task.outputPath || !(await this.storage.exists(task.outputPath))) {
      throw new NotFoundError("Result file not found");
    }

    return {
      path: task.outputPath,
      filename: downloadFilename(task.originalFilename, task.targetFormat),
      contentType: contentTypeFor(task.outputPath),
    };
  }
}
