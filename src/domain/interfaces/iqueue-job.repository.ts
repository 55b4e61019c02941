import { QueueJob } from "../entities/queue-job";
import { QueueName } from "../enums/queue.name";

export type NewQueueJob = Omit<QueueJob, "id" | "createdAt" | "updatedAt">;

export interface IQueueJobRepository {
  create(job: NewQueueJob): Promise<QueueJob>;
  findById(id: string): Promise<QueueJob | null>;
  /**
   * Atomically takes the oldest due pending job of the given queues,
   * incrementing its attempts and locking it to `workerId`.
   */
  claimNext(queues: readonly QueueName[], workerId: string, now: Date): Promise<QueueJob | null>;
  markCompleted(id: string, now: Date): Promise<void>;
  markFailed(id: string, error: string, now: Date): Promise<void>;
  scheduleRetry(id: string, error: string, runAt: Date): Promise<void>;
  /** Pending or active jobs become revoked; returns false when already finished. */
  revoke(id: string, now: Date): Promise<boolean>;
  findRevokedIds(ids: string[]): Promise<string[]>;
  /** Active jobs whose lock expired go back to pending while retries remain. Returns how many. */
  releaseExpiredLocks(now: Date): Promise<number>;
  /** Active jobs whose lock expired on their last attempt become failed. Returns those jobs. */
  failExhaustedLocks(now: Date): Promise<QueueJob[]>;
  /** Deletes completed, failed and revoked jobs finished before `before`. */
  purgeFinished(before: Date): Promise<number>;
}
