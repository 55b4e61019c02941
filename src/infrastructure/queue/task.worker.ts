import { hostname } from "os";
import { QueueJob } from "../../domain/entities/queue-job";
import { JobName, QueueName } from "../../domain/enums/queue.name";
import { errorMessage } from "../../domain/errors/app.error";
import { IQueueJobRepository } from "../../domain/interfaces/iqueue-job.repository";

export interface JobContext {
  jobId: string;
  attempt: number;
  isFinalAttempt: boolean;
  signal: AbortSignal;
}

export type JobHandler = (job: QueueJob, context: JobContext) => Promise<void>;
export type JobHandlers = Partial<Record<JobName, JobHandler>>;

export interface TaskWorkerOptions {
  queues: readonly QueueName[];
  concurrency: number;
  pollIntervalMs: number;
  workerId?: string;
}

export class JobTimeoutError extends Error {
  constructor(job: QueueJob) {
    super(`Job ${job.name} exceeded its time limit of ${Math.round(job.timeLimitMs / 1000)}s`);
    this.name = "JobTimeoutError";
  }
}

export class JobRevokedError extends Error {
  constructor(jobId: string) {
    super(`Job ${jobId} was revoked`);
    this.name = "JobRevokedError";
  }
}

interface RunningJob {
  controller: AbortController;
  done: Promise<void>;
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([work, aborted]).finally(() => {
    signal.removeEventListener("abort", onAbort);
  });
}

/**
 * Consumer side of the task queue. Keeps up to `concurrency` jobs in flight,
 * claiming one job per free slot on every poll.
 */
export class TaskWorker {
  readonly workerId: string;
  private readonly running = new Map<string, RunningJob>();
  private loop: Promise<void> | null = null;
  private stopping = false;
  private wake: (() => void) | null = null;

  constructor(
    private repository: IQueueJobRepository,
    private handlers: JobHandlers,
    private options: TaskWorkerOptions
  ) {
    this.workerId = options.workerId ?? `${hostname()}-${process.pid}`;
  }

  start(): void {
    if (this.loop) {
      console.log("[TaskWorker] Worker is already running");
      return;
    }
    this.stopping = false;
    this.loop = this.runLoop();
    console.log(
      `[TaskWorker] ${this.workerId} consuming [${this.options.queues.join(", ")}] ` +
        `with concurrency ${this.options.concurrency}`
    );
  }

  /** Stops polling and waits for in-flight jobs to settle. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.wake?.();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await this.waitForIdle();
    console.log("[TaskWorker] Stopped");
  }

  isActive(): boolean {
    return this.loop !== null;
  }

  activeJobIds(): string[] {
    return [...this.running.keys()];
  }

  async waitForIdle(): Promise<void> {
    await Promise.all([...this.running.values()].map((job) => job.done));
  }

  /**
   * One poll: aborts jobs revoked elsewhere, then fills free slots.
   * Returns how many jobs were claimed.
   */
  async tick(): Promise<number> {
    await this.abortRevokedJobs();

    let claimed = 0;
    while (!this.stopping && this.running.size < this.options.concurrency) {
      const job = await this.repository.claimNext(this.options.queues, this.workerId, new Date());
      if (!job) {
        break;
      }
      this.launch(job);
      claimed++;
    }
    return claimed;
  }

  private async runLoop(): Promise<void> {
    while (!this.stopping) {
      try {
        await this.tick();
      } catch (error: unknown) {
        console.error("[TaskWorker] Poll failed:", error);
      }
      await this.sleep(this.options.pollIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private async abortRevokedJobs(): Promise<void> {
    const ids = this.activeJobIds();
    if (ids.length === 0) {
      return;
    }
    const revoked = await this.repository.findRevokedIds(ids);
    for (const id of revoked) {
      const job = this.running.get(id);
      if (job && !job.controller.signal.aborted) {
        console.log(`[TaskWorker] Aborting revoked job ${id}`);
        job.controller.abort(new JobRevokedError(id));
      }
    }
  }

  private launch(job: QueueJob): void {
    const controller = new AbortController();
    const done = this.execute(job, controller)
      .catch((error: unknown) => {
        console.error(`[TaskWorker] Bookkeeping failed for job ${job.id}:`, error);
      })
      .finally(() => {
        this.running.delete(job.id);
      });
    this.running.set(job.id, { controller, done });
  }

  private async execute(job: QueueJob, controller: AbortController): Promise<void> {
    const handler = this.handlers[job.name];
    if (!handler) {
      await this.repository.markFailed(job.id, `No handler registered for ${job.name}`, new Date());
      console.error(`[TaskWorker] No handler registered for ${job.name}, job ${job.id} failed`);
      return;
    }

    const context: JobContext = {
      jobId: job.id,
      attempt: job.attempts,
      isFinalAttempt: job.attempts > job.maxRetries,
      signal: controller.signal,
    };
    const timer = setTimeout(() => controller.abort(new JobTimeoutError(job)), job.timeLimitMs);
    const startTime = Date.now();

    try {
      console.log(`[TaskWorker] Running ${job.name} job ${job.id} (attempt ${job.attempts}/${job.maxRetries + 1})`);
      await untilAborted(handler(job, context), controller.signal);
      await this.repository.markCompleted(job.id, new Date());
      console.log(`[TaskWorker] Job ${job.id} completed in ${Date.now() - startTime}ms`);
    } catch (error: unknown) {
      await this.handleFailure(job, error, controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async handleFailure(job: QueueJob, error: unknown, signal: AbortSignal): Promise<void> {
    if (signal.aborted && signal.reason instanceof JobRevokedError) {
      console.log(`[TaskWorker] Job ${job.id} stopped after revocation`);
      return;
    }

    const message = errorMessage(error);
    if (job.attempts <= job.maxRetries) {
      const runAt = new Date(Date.now() + job.retryDelayMs);
      await this.repository.scheduleRetry(job.id, message, runAt);
      console.warn(
        `[TaskWorker] Job ${job.id} failed (attempt ${job.attempts}), retrying at ${runAt.toISOString()}: ${message}`
      );
      return;
    }

    await this.repository.markFailed(job.id, message, new Date());
    console.error(`[TaskWorker] Job ${job.id} failed permanently after ${job.attempts} attempt(s): ${message}`);
  }
}
