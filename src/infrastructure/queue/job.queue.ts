import { QueueJob, QueueJobPayload } from "../../domain/entities/queue-job";
import { JobName } from "../../domain/enums/queue.name";
import { IQueueJobRepository } from "../../domain/interfaces/iqueue-job.repository";
import { ITaskQueue } from "../../domain/interfaces/itask.queue";
import { JOB_DEFINITIONS, JobDefinition } from "./job.definitions";

/**
 * Producer side of the task queue. Jobs are rows in the queue job store;
 * any TaskWorker sharing the store picks them up.
 */
export class JobQueue implements ITaskQueue {
  constructor(
    private repository: IQueueJobRepository,
    private definitions: Record<JobName, JobDefinition> = JOB_DEFINITIONS
  ) {}

  async enqueue(name: JobName, payload: QueueJobPayload, options?: { delayMs?: number }): Promise<QueueJob> {
    const definition = this.definitions[name];
    const job = await this.repository.create({
      queue: definition.queue,
      name,
      payload,
      status: "pending",
      attempts: 0,
      maxRetries: definition.maxRetries,
      retryDelayMs: definition.retryDelayMs,
      timeLimitMs: definition.timeLimitMs,
      runAt: new Date(Date.now() + (options?.delayMs ?? 0)),
    });
    console.log(`[JobQueue] Enqueued ${name} job ${job.id} on queue ${definition.queue}`);
    return job;
  }

  async revoke(jobId: string): Promise<boolean> {
    const revoked = await this.repository.revoke(jobId, new Date());
    console.log(`[JobQueue] Revoke ${jobId}: ${revoked ? "revoked" : "already finished"}`);
    return revoked;
  }

  async get(jobId: string): Promise<QueueJob | null> {
    return this.repository.findById(jobId);
  }
}
