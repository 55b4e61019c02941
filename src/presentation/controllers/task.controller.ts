import { Request, Response } from "express";
import { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { sendError } from "../middleware/error.middleware";
import { SubmitConversionUseCase } from "../../application/use-cases/submit-conversion.use-case";
import { ListTasksUseCase } from "../../application/use-cases/list-tasks.use-case";
import { GetTaskStatusUseCase } from "../../application/use-cases/get-task-status.use-case";
import { GetTaskResultUseCase } from "../../application/use-cases/get-task-result.use-case";
import { GetTaskDownloadUseCase } from "../../application/use-cases/get-task-download.use-case";
import { BuildBatchArchiveUseCase } from "../../application/use-cases/build-batch-archive.use-case";
import { CancelTaskUseCase } from "../../application/use-cases/cancel-task.use-case";
import { DeleteTaskUseCase } from "../../application/use-cases/delete-task.use-case";
import { readBody, toUploadedFile } from "../dto/request.dto";
import {
  toTaskCreatedResponse,
  toTaskListResponse,
  toTaskResultResponse,
  toTaskStatusResponse,
} from "../dto/task.dto";

export class TaskController {
  constructor(
    private submitConversionUseCase: SubmitConversionUseCase,
    private listTasksUseCase: ListTasksUseCase,
    private getTaskStatusUseCase: GetTaskStatusUseCase,
    private getTaskResultUseCase: GetTaskResultUseCase,
    private getTaskDownloadUseCase: GetTaskDownloadUseCase,
    private buildBatchArchiveUseCase: BuildBatchArchiveUseCase,
    private cancelTaskUseCase: CancelTaskUseCase,
    private deleteTaskUseCase: DeleteTaskUseCase
  ) {}

  async createTask(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const isMultipart = Boolean(req.is("multipart/form-data"));
      if (!isMultipart && !req.is("application/json")) {
        res.status(400).json({ success: false, error: "Content-Type must be multipart/form-data or application/json" });
        return;
      }

      const fields = readBody(req);
      const task = await this.submitConversionUseCase.execute({
        file: isMultipart && req.file ? toUploadedFile(req.file) : undefined,
        url: typeof fields.url === "string" ? fields.url : undefined,
        fields,
        createdBy: req.user?.userId,
      });

      res.status(202).json(toTaskCreatedResponse(task));
    } catch (error: unknown) {
      sendError(res, error, "Failed to create task");
    }
  }

  async listTasks(req: Request, res: Response): Promise<void> {
    try {
      const { tasks, pagination } = await this.listTasksUseCase.execute({
        page: req.query.page,
        perPage: req.query.per_page,
        status: req.query.status,
        format: req.query.format,
        order: req.query.order,
      });
      res.status(200).json(toTaskListResponse(tasks, pagination));
    } catch (error: unknown) {
      sendError(res, error, "Failed to list tasks");
    }
  }

  async getStatus(req: Request, res: Response): Promise<void> {
    try {
      const task = await this.getTaskStatusUseCase.execute({ taskId: req.params.id });
      res.status(200).json(toTaskStatusResponse(task));
    } catch (error: unknown) {
      sendError(res, error, "Failed to get task status");
    }
  }

  async getResult(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.getTaskResultUseCase.execute({ taskId: req.params.id });
      res.status(200).json(toTaskResultResponse(result));
    } catch (error: unknown) {
      sendError(res, error, "Failed to get task result");
    }
  }

  async download(req: Request, res: Response): Promise<void> {
    try {
      const file = await this.getTaskDownloadUseCase.execute({ taskId: req.params.id });
      res.setHeader("Content-Type", file.contentType);
      res.download(file.path, file.filename, (error?: Error) => {
        if (error && !res.headersSent) {
          sendError(res, error, "Failed to send file");
        }
      });
    } catch (error: unknown) {
      sendError(res, error, "Failed to download result");
    }
  }

  async batchDownload(req: Request, res: Response): Promise<void> {
    try {
      const taskIds = req.method === "GET" ? req.query.task_ids : readBody(req).task_ids;
      const archive = await this.buildBatchArchiveUseCase.execute({ taskIds });

      res.attachment(archive.filename);
      res.setHeader("X-Total-Tasks", String(archive.totalTasks));
      res.setHeader("X-Successful-Tasks", String(archive.successfulTasks));
      res.setHeader("X-Files-Count", String(archive.filesCount));
      res.status(200).send(archive.content);
    } catch (error: unknown) {
      sendError(res, error, "Failed to build archive");
    }
  }

  async cancel(req: Request, res: Response): Promise<void> {
    try {
      const task = await this.cancelTaskUseCase.execute({ taskId: req.params.id });
      res.status(200).json({ success: true, task_id: task.id, status: task.status, message: "Task cancelled" });
    } catch (error: unknown) {
      sendError(res, error, "Failed to cancel task");
    }
  }

  async delete(req: Request, res: Response): Promise<void> {
    try {
      await this.deleteTaskUseCase.execute({ taskId: req.params.id });
      res.status(200).json({ success: true, task_id: req.params.id, message: "Task deleted" });
    } catch (error: unknown) {
      sendError(res, error, "Failed to delete task");
    }
  }
}
