import { QueueJob } from "../../../src/domain/entities/queue-job";
import { JobName } from "../../../src/domain/enums/queue.name";
import { JOB_DEFINITIONS, JobDefinition } from "../../../src/infrastructure/queue/job.definitions";
import { createJobHandlers } from "../../../src/infrastructure/queue/job.handlers";
import { JobQueue } from "../../../src/infrastructure/queue/job.queue";
import {
  JobContext,
  JobHandlers,
  JobRevokedError,
  JobTimeoutError,
  TaskWorker,
} from "../../../src/infrastructure/queue/task.worker";
import { TaskProgressService } from "../../../src/application/services/task-progress.service";
import { ResumeIncompleteJobsUseCase } from "../../../src/application/use-cases/resume-incomplete-jobs.use-case";
import { InMemoryHistoryRepository } from "../../fakes/in-memory-history.repository";
import { InMemoryQueueJobRepository } from "../../fakes/in-memory-queue-job.repository";
import { InMemoryTaskRepository } from "../../fakes/in-memory-task.repository";
import { buildTask, jobContext } from "../../fakes/test-context";

function never(): Promise<void> {
  return new Promise<void>(() => undefined);
}

describe("TaskWorker", () => {
  let repository: InMemoryQueueJobRepository;
  let queue: JobQueue;

  function workerWith(handlers: JobHandlers, concurrency = 2): TaskWorker {
    return new TaskWorker(repository, handlers, {
      queues: ["default"],
      concurrency,
      pollIntervalMs: 10,
      workerId: "worker-test",
    });
  }

  beforeEach(() => {
    repository = new InMemoryQueueJobRepository();
    queue = new JobQueue(repository);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("runs a claimed job and marks it completed", async () => {
    const contexts: JobContext[] = [];
    const worker = workerWith({
      "conversion.run": async (_job, context) => {
        contexts.push(context);
      },
    });
    await queue.enqueue("conversion.run", { taskId: "task-1" });

    expect(await worker.tick()).toBe(1);
    await worker.waitForIdle();

    expect(contexts[0]).toMatchObject({ jobId: "job-1", attempt: 1, isFinalAttempt: false });
    expect(repository.jobs.get("job-1")).toMatchObject({ status: "completed", attempts: 1, lockedBy: undefined });
    expect(worker.activeJobIds()).toEqual([]);
  });

  it("only claims jobs from its own queues", async () => {
    const worker = workerWith({});
    await queue.enqueue("audio.transcribe", { taskId: "task-1" });

    expect(await worker.tick()).toBe(0);
    expect(repository.jobs.get("job-1")?.status).toBe("pending");
  });

  it("claims no more jobs than its concurrency allows", async () => {
    const worker = workerWith({ "conversion.run": never }, 1);
    await queue.enqueue("conversion.run", { taskId: "task-1" });
    await queue.enqueue("conversion.run", { taskId: "task-2" });

    expect(await worker.tick()).toBe(1);
    expect(worker.activeJobIds()).toEqual(["job-1"]);
    expect(repository.jobs.get("job-2")?.status).toBe("pending");

    // Release the slot so the time-limit timer is cleared
    await queue.revoke("job-1");
    await queue.revoke("job-2");
    await worker.tick();
    await worker.waitForIdle();
  });

  it("schedules a retry while attempts remain", async () => {
    const worker = workerWith({
      "conversion.run": async () => {
        throw new Error("encoder crashed");
      },
    });
    await queue.enqueue("conversion.run", { taskId: "task-1" });
    const before = Date.now();

    await worker.tick();
    await worker.waitForIdle();

    const job = repository.jobs.get("job-1");
    expect(job).toMatchObject({ status: "pending", attempts: 1, error: "encoder crashed" });
    expect(job?.runAt.getTime()).toBeGreaterThanOrEqual(before + 60 * 1000);
  });

  it("fails the job once its retries are used up", async () => {
    const definitions: Record<JobName, JobDefinition> = {
      ...JOB_DEFINITIONS,
      "conversion.run": { queue: "default", maxRetries: 0, retryDelayMs: 0, timeLimitMs: 1000 },
    };
    const contexts: JobContext[] = [];
    const worker = workerWith({
      "conversion.run": async (_job, context) => {
        contexts.push(context);
        throw new Error("encoder crashed");
      },
    });
    await new JobQueue(repository, definitions).enqueue("conversion.run", { taskId: "task-1" });

    await worker.tick();
    await worker.waitForIdle();

    expect(contexts[0].isFinalAttempt).toBe(true);
    expect(repository.jobs.get("job-1")).toMatchObject({ status: "failed", error: "encoder crashed" });
  });

  it("aborts a job that runs past its time limit", async () => {
    const definitions: Record<JobName, JobDefinition> = {
      ...JOB_DEFINITIONS,
      "conversion.run": { queue: "default", maxRetries: 0, retryDelayMs: 0, timeLimitMs: 20 },
    };
    let seen: AbortSignal | null = null;
    const worker = workerWith({
      "conversion.run": (_job, context) => {
        seen = context.signal;
        return never();
      },
    });
    await new JobQueue(repository, definitions).enqueue("conversion.run", { taskId: "task-1" });

    await worker.tick();
    await worker.waitForIdle();

    expect(repository.jobs.get("job-1")).toMatchObject({
      status: "failed",
      error: "Job conversion.run exceeded its time limit of 0s",
    });
    expect(seen).not.toBeNull();
  });

  it("aborts a running job when it is revoked", async () => {
    let reason: unknown = null;
    const worker = workerWith({
      "conversion.run": (_job, context) => {
        context.signal.addEventListener("abort", () => {
          reason = context.signal.reason;
        });
        return never();
      },
    });
    await queue.enqueue("conversion.run", { taskId: "task-1" });
    await worker.tick();

    expect(await queue.revoke("job-1")).toBe(true);
    await worker.tick();
    await worker.waitForIdle();

    expect(reason).toBeInstanceOf(JobRevokedError);
    expect(repository.jobs.get("job-1")?.status).toBe("revoked");
  });

  it("fails jobs that have no handler", async () => {
    const worker = workerWith({});
    await queue.enqueue("conversion.run", {});

    await worker.tick();
    await worker.waitForIdle();

    expect(repository.jobs.get("job-1")).toMatchObject({
      status: "failed",
      error: "No handler registered for conversion.run",
    });
  });

  it("polls in the background until stopped", async () => {
    const done: string[] = [];
    const worker = workerWith({
      "conversion.run": async (job) => {
        done.push(job.id);
      },
    });
    await queue.enqueue("conversion.run", { taskId: "task-1" });

    worker.start();
    expect(worker.isActive()).toBe(true);
    await new Promise((resolve) => setTimeout(resolve, 50));
    await worker.stop();

    expect(done).toEqual(["job-1"]);
    expect(worker.isActive()).toBe(false);
  });
});

describe("JobTimeoutError", () => {
  it("names the job and its limit in seconds", () => {
    const job: QueueJob = {
      id: "job-1",
      queue: "audio_processing",
      name: "audio.transcribe",
      payload: {},
      status: "active",
      attempts: 1,
      maxRetries: 2,
      retryDelayMs: 120000,
      timeLimitMs: 3600000,
      runAt: new Date(),
      createdAt: new Date(),
      updatedAt: new Date(),
    };

    expect(new JobTimeoutError(job).message).toBe("Job audio.transcribe exceeded its time limit of 3600s");
  });
});

describe("ResumeIncompleteJobsUseCase", () => {
  let repository: InMemoryQueueJobRepository;
  let tasks: InMemoryTaskRepository;
  let useCase: ResumeIncompleteJobsUseCase;

  beforeEach(() => {
    repository = new InMemoryQueueJobRepository();
    tasks = new InMemoryTaskRepository();
    useCase = new ResumeIncompleteJobsUseCase(repository, new TaskProgressService(tasks, new InMemoryHistoryRepository()), 1000);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("releases expired locks and purges expired results", async () => {
    const queue = new JobQueue(repository);
    await queue.enqueue("conversion.run", { taskId: "task-1" });
    await queue.enqueue("conversion.run", { taskId: "task-2" });
    const claimedAt = new Date(Date.now() + 1000);
    await repository.claimNext(["default"], "dead-worker", claimedAt);
    const second = await repository.claimNext(["default"], "live-worker", claimedAt);
    await repository.markCompleted(second?.id ?? "", claimedAt);

    // conversion.run holds its lock for 1800s plus a 60s grace period
    const later = new Date(claimedAt.getTime() + 1861 * 1000);
    const result = await useCase.execute({ now: later });

    expect(result).toEqual({ released: 1, failed: 0, purged: 1 });
    expect(repository.jobs.get("job-1")).toMatchObject({ status: "pending", attempts: 1, lockedBy: undefined });
    expect(repository.jobs.has("job-2")).toBe(false);
  });

  it("fails a job and its task once the lost attempt was the last one", async () => {
    tasks.seed(buildTask({ id: "task-1", status: "running" }));
    const job = await new JobQueue(repository).enqueue("conversion.run", { taskId: "task-1" });
    repository.jobs.set(job.id, { ...job, attempts: 3 });
    const claimedAt = new Date(Date.now() + 1000);
    await repository.claimNext(["default"], "dead-worker", claimedAt);

    const result = await useCase.execute({ now: new Date(claimedAt.getTime() + 1861 * 1000) });

    expect(result).toEqual({ released: 0, failed: 1, purged: 0 });
    expect(repository.jobs.get(job.id)).toMatchObject({
      status: "failed",
      attempts: 4,
      error: "Job conversion.run was abandoned by its worker after 4 attempt(s)",
    });
    expect(tasks.tasks.get("task-1")).toMatchObject({
      status: "failed",
      errorMessage: "Job conversion.run was abandoned by its worker after 4 attempt(s)",
    });
  });
});

describe("createJobHandlers", () => {
  const job: QueueJob = {
    id: "job-9",
    queue: "image_processing",
    name: "images.gif",
    payload: { taskId: "task-7" },
    status: "active",
    attempts: 1,
    maxRetries: 2,
    retryDelayMs: 60000,
    timeLimitMs: 1800000,
    runAt: new Date(),
    createdAt: new Date(),
    updatedAt: new Date(),
  };

  function runners() {
    return {
      runConversion: jest.fn(async () => undefined),
      transcribeAudio: jest.fn(async () => undefined),
      buildGif: jest.fn(async () => undefined),
      cleanup: jest.fn(async () => ({ removed: 0 })),
    };
  }

  it("passes the task id and context to the matching runner", async () => {
    const mocks = runners();
    const handlers = createJobHandlers(mocks);
    const context = jobContext({ jobId: "job-9" });

    await handlers["images.gif"]?.(job, context);

    expect(mocks.buildGif).toHaveBeenCalledWith({ taskId: "task-7", context });
    expect(mocks.runConversion).not.toHaveBeenCalled();
  });

  it("rejects a job without a task id", async () => {
    const handlers = createJobHandlers(runners());

    await expect(handlers["images.gif"]?.({ ...job, payload: {} }, jobContext())).rejects.toThrow(
      "Job job-9 (images.gif) has no taskId in its payload"
    );
  });

  it("runs the cleanup for maintenance jobs", async () => {
    const mocks = runners();

    await createJobHandlers(mocks)["maintenance.cleanup"]?.({ ...job, name: "maintenance.cleanup" }, jobContext());

    expect(mocks.cleanup).toHaveBeenCalledTimes(1);
  });
});
