import { IQueueJobRepository } from "../../domain/interfaces/iqueue-job.repository";
import { TaskProgressService } from "../services/task-progress.service";

export interface ResumeIncompleteJobsParams {
  now?: Date;
}

export interface ResumeIncompleteJobsResult {
  released: number; // Jobs whose worker vanished, returned to pending
  failed: number; // Same, but on their last attempt
  purged: number; // Finished jobs past the result expiry
}

/**
 * Puts jobs held by dead workers back on their queue, fails the ones that
 * already used their last attempt along with their tasks, and drops
 * finished job rows once their results have expired.
 */
export class ResumeIncompleteJobsUseCase {
  constructor(
    private queueJobRepository: IQueueJobRepository,
    private taskProgress: TaskProgressService,
    private resultExpiresMs: number
  ) {}

  async execute(params: ResumeIncompleteJobsParams = {}): Promise<ResumeIncompleteJobsResult> {
    const now = params.now ?? new Date();
    const exhausted = await this.queueJobRepository.failExhaustedLocks(now);
    for (const job of exhausted) {
      if (job.payload.taskId) {
        await this.taskProgress.fail(job.payload.taskId, job.error ?? "Job was abandoned by its worker");
      }
    }
    const released = await this.queueJobRepository.releaseExpiredLocks(now);
    const purged = await this.queueJobRepository.purgeFinished(new Date(now.getTime() - this.resultExpiresMs));
    return { released, failed: exhausted.length, purged };
  }
}
