import { JobName, QueueJobStatus, QueueName } from "../enums/queue.name";

export interface QueueJobPayload {
  taskId?: string;
}

export interface QueueJob {
  id: string;
  queue: QueueName;
  name: JobName;
  payload: QueueJobPayload;
  status: QueueJobStatus;
  attempts: number; // Incremented every time a worker claims the job
  maxRetries: number;
  retryDelayMs: number;
  timeLimitMs: number;
  runAt: Date;
  lockedBy?: string;
  lockedAt?: Date;
  lockExpiresAt?: Date;
  error?: string;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export function abandonedMessage(job: Pick<QueueJob, "name" | "attempts">): string {
  return `Job ${job.name} was abandoned by its worker after ${job.attempts} attempt(s)`;
}
