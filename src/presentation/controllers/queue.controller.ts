import { Request, Response } from "express";
import { sendError } from "../middleware/error.middleware";
import { GetQueueOverviewUseCase } from "../../application/use-cases/get-queue-overview.use-case";
import { ClearCompletedTasksUseCase } from "../../application/use-cases/clear-completed-tasks.use-case";
import { GetConversionHistoryUseCase } from "../../application/use-cases/get-conversion-history.use-case";
import { GetHistoryStatsUseCase } from "../../application/use-cases/get-history-stats.use-case";
import { toTaskSummary } from "../dto/task.dto";
import { toHistoryEntryResponse, toHistoryFiltersResponse, toHistoryStatsResponse } from "../dto/history.dto";

export class QueueController {
  constructor(
    private getQueueOverviewUseCase: GetQueueOverviewUseCase,
    private clearCompletedTasksUseCase: ClearCompletedTasksUseCase,
    private getConversionHistoryUseCase: GetConversionHistoryUseCase,
    private getHistoryStatsUseCase: GetHistoryStatsUseCase
  ) {}

  async overview(_req: Request, res: Response): Promise<void> {
    try {
      const { tasks, stats } = await this.getQueueOverviewUseCase.execute();
      res.status(200).json({ success: true, tasks: tasks.map(toTaskSummary), stats });
    } catch (error: unknown) {
      sendError(res, error, "Failed to load queue");
    }
  }

  async clearCompleted(_req: Request, res: Response): Promise<void> {
    try {
      const { deletedCount } = await this.clearCompletedTasksUseCase.execute();
      res.status(200).json({ success: true, deleted_count: deletedCount });
    } catch (error: unknown) {
      sendError(res, error, "Failed to clear completed tasks");
    }
  }

  async history(req: Request, res: Response): Promise<void> {
    try {
      const { entries, pagination, filters } = await this.getConversionHistoryUseCase.execute({
        page: req.query.page,
        perPage: req.query.per_page,
        fileType: req.query.file_type,
        status: req.query.status,
        search: req.query.search,
        period: req.query.period,
      });
      res.status(200).json({
        success: true,
        history: entries.map(toHistoryEntryResponse),
        pagination,
        filters: toHistoryFiltersResponse(filters),
      });
    } catch (error: unknown) {
      sendError(res, error, "Failed to load history");
    }
  }

  async historyStats(_req: Request, res: Response): Promise<void> {
    try {
      const stats = await this.getHistoryStatsUseCase.execute();
      res.status(200).json(toHistoryStatsResponse(stats));
    } catch (error: unknown) {
      sendError(res, error, "Failed to load history stats");
    }
  }
}
