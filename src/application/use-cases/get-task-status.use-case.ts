import { ConversionTask } from "../../domain/entities/conversion-task";
import { NotFoundError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";

export class GetTaskStatusUseCase {
  constructor(private taskRepository: IConversionTaskRepository) {}

  async execute(params: { taskId: string }): Promise<ConversionTask> {
    const task = await this.taskRepository.findById(params.taskId);
    if (!task) {
      throw new NotFoundError("Task not found");
    }
    return task;
  }
}
