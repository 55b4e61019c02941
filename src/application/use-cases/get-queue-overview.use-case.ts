import { ConversionTask } from "../../domain/entities/conversion-task";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";

const RECENT_WINDOW_MS = 24 * 60 * 60 * 1000;
const OVERVIEW_LIMIT = 100;

export interface QueueStats {
  total: number;
  queued: number;
  running: number;
  completed: number;
  failed: number;
}

export interface QueueOverview {
  tasks: ConversionTask[];
  stats: QueueStats;
}

export class GetQueueOverviewUseCase {
  constructor(private taskRepository: IConversionTaskRepository) {}

  async execute(params: { now?: Date } = {}): Promise<QueueOverview> {
    const now = params.now ?? new Date();
    const tasks = await this.taskRepository.findRecentOrActive(new Date(now.getTime() - RECENT_WINDOW_MS), OVERVIEW_LIMIT);
    const counts = await this.taskRepository.countByStatus();

    return {
      tasks,
      stats: {
        total: counts.queued + counts.running + counts.done + counts.failed,
        queued: counts.queued,
        running: counts.running,
        completed: counts.done,
        failed: counts.failed,
      },
    };
  }
}
