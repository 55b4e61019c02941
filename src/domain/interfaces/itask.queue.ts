import { QueueJob, QueueJobPayload } from "../entities/queue-job";
import { JobName } from "../enums/queue.name";

export interface ITaskQueue {
  enqueue(name: JobName, payload: QueueJobPayload, options?: { delayMs?: number }): Promise<QueueJob>;
  revoke(jobId: string): Promise<boolean>;
  get(jobId: string): Promise<QueueJob | null>;
}
