import { TaskProgressService } from "../../../src/application/services/task-progress.service";
import { ResumeIncompleteJobsUseCase } from "../../../src/application/use-cases/resume-incomplete-jobs.use-case";
import { loadConfig } from "../../../src/infrastructure/config/app.config";
import { JobRecoveryCron } from "../../../src/infrastructure/cron/job-recovery.cron";
import { MaintenanceCron } from "../../../src/infrastructure/cron/maintenance.cron";
import { JobQueue } from "../../../src/infrastructure/queue/job.queue";
import { InMemoryHistoryRepository } from "../../fakes/in-memory-history.repository";
import { InMemoryQueueJobRepository } from "../../fakes/in-memory-queue-job.repository";
import { InMemoryTaskRepository } from "../../fakes/in-memory-task.repository";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.jwt.secret).toBeUndefined();
    expect(config.speech).toMatchObject({ preferredEngine: "whisper", whisperModel: "whisper-1", maxAudioDurationSec: 3600 });
    expect(config.queue).toEqual({
      workerEnabled: true,
      concurrency: 2,
      queues: ["default", "audio_processing", "image_processing", "maintenance"],
      pollIntervalMs: 2000,
      resultExpiresMs: 3600000,
    });
    expect(config.binaries.sevenZip).toBe("7z");
  });

  it("reads worker and speech settings from the environment", () => {
    const config = loadConfig({
      STT_ENGINE: " Google ",
      WORKER_ENABLED: "FALSE",
      WORKER_CONCURRENCY: "0",
      WORKER_QUEUES: "default, bogus,maintenance",
      JWT_SECRET: "test-secret",
      TASK_RETENTION_DAYS: "30",
    });

    expect(config.speech.preferredEngine).toBe("google");
    expect(config.queue).toMatchObject({ workerEnabled: false, concurrency: 1, queues: ["default", "maintenance"] });
    expect(config.jwt.secret).toBe("test-secret");
    expect(config.cleanup.taskRetentionDays).toBe(30);
  });

  it("ignores an unknown speech engine", () => {
    expect(loadConfig({ STT_ENGINE: "vosk" }).speech.preferredEngine).toBe("whisper");
  });
});

describe("cron jobs", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("MaintenanceCron enqueues a cleanup job each cycle", async () => {
    const repository = new InMemoryQueueJobRepository();
    const cron = new MaintenanceCron(new JobQueue(repository));

    await cron.runCycle();

    expect(repository.jobs.get("job-1")).toMatchObject({ name: "maintenance.cleanup", queue: "maintenance" });
  });

  it("JobRecoveryCron survives a failing recovery", async () => {
    const tasks = new InMemoryTaskRepository();
    const useCase = new ResumeIncompleteJobsUseCase(
      new InMemoryQueueJobRepository(),
      new TaskProgressService(tasks, new InMemoryHistoryRepository()),
      1000
    );
    jest.spyOn(useCase, "execute").mockRejectedValue(new Error("mongo unavailable"));
    const cron = new JobRecoveryCron(useCase);

    await expect(cron.runCycle()).resolves.toBeUndefined();
    expect(useCase.execute).toHaveBeenCalledTimes(1);
  });

  it("starts and stops its schedule", () => {
    const cron = new MaintenanceCron(new JobQueue(new InMemoryQueueJobRepository()));

    cron.start();
    expect(cron.isActive()).toBe(true);
    cron.stop();
    expect(cron.isActive()).toBe(false);
  });
});
