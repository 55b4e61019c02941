import { ConversionTask, JsonObject } from "../../domain/entities/conversion-task";
import { IConversionHistoryRepository } from "../../domain/interfaces/iconversion-history.repository";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { historyFromTask } from "../../domain/utils/conversion-history.stats";
import {
  TaskTransition,
  completeTransition,
  failTransition,
  progressTransition,
  startTransition,
} from "../../domain/utils/conversion-task.state";

export interface ProgressReporter {
  /** Queues a progress write; writes run one at a time, in order. */
  report(progress: number): void;
  /** Resolves once every queued write has finished. */
  flush(): Promise<void>;
}

export interface TaskCompletion {
  outputPath?: string;
  metadata?: JsonObject;
  outputSize?: number;
}

/**
 * Writes task state changes. Each write is guarded by the statuses it may
 * leave from, so a task that was cancelled or finished elsewhere is left
 * untouched and the caller gets null back.
 */
export class TaskProgressService {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private historyRepository: IConversionHistoryRepository
  ) {}

  async start(task: ConversionTask): Promise<ConversionTask | null> {
    return this.apply(task.id, startTransition(task));
  }

  async progress(taskId: string, progress: number): Promise<void> {
    const transition = progressTransition(progress);
    if (!transition) {
      console.warn(`[TaskProgress] Ignoring invalid progress ${progress} for task ${taskId}`);
      return;
    }
    await this.apply(taskId, transition);
  }

  /** For engines that report progress through a synchronous callback. */
  createReporter(taskId: string, map: (progress: number) => number = (progress) => progress): ProgressReporter {
    let pending: Promise<void> = Promise.resolve();
    let last = -1;
    return {
      report: (progress: number) => {
        const value = Math.floor(map(progress));
        if (value <= last) {
          return;
        }
        last = value;
        pending = pending.then(() => this.progress(taskId, value)).catch((error: unknown) => {
          console.warn(`[TaskProgress] Progress write failed for task ${taskId}:`, error);
        });
      },
      flush: () => pending,
    };
  }

  async complete(task: ConversionTask, completion: TaskCompletion): Promise<ConversionTask | null> {
    const updated = await this.apply(task.id, completeTransition(task, completion));
    if (updated) {
      await this.recordHistory(updated, completion.outputSize);
    }
    return updated;
  }

  async fail(taskId: string, message: string): Promise<ConversionTask | null> {
    const updated = await this.apply(taskId, failTransition(message));
    if (updated) {
      await this.recordHistory(updated, undefined);
    }
    return updated;
  }

  private async apply(taskId: string, transition: TaskTransition): Promise<ConversionTask | null> {
    const updated = await this.taskRepository.updateIfStatus(taskId, transition.from, transition.updates);
    if (!updated && transition.updates.status) {
      console.log(`[TaskProgress] Task ${taskId} did not move to ${transition.updates.status}; it is no longer in ${transition.from.join("/")}`);
    }
    return updated;
  }

  private async recordHistory(task: ConversionTask, outputSize: number | undefined): Promise<void> {
    const entry = historyFromTask(task, outputSize);
    if (!entry) {
      return;
    }
    try {
      await this.historyRepository.create(entry);
    } catch (error: unknown) {
      console.error(`[TaskProgress] Failed to record history for task ${task.id}:`, error);
    }
  }
}
