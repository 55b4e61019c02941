import { Server } from "http";
import { config } from "./infrastructure/config/app.config";
import { connectToMongoDB, closeMongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { ConversionTaskRepository } from "./infrastructure/database/repositories/conversion-task.repository";
import { ConversionHistoryRepository } from "./infrastructure/database/repositories/conversion-history.repository";
import { QueueJobRepository } from "./infrastructure/database/repositories/queue-job.repository";
import { MediaStorage } from "./infrastructure/storage/media.storage";
import { FfmpegRunner } from "./infrastructure/ffmpeg/ffmpeg.runner";
import { FfmpegAudioProcessor } from "./infrastructure/audio/ffmpeg.audio.processor";
import { OpenAITranscriptionProvider } from "./infrastructure/openai/openai.transcription.provider";
import { GoogleSpeechProvider } from "./infrastructure/google/google.speech.provider";
import { HttpFileDownloader } from "./infrastructure/http/file.downloader";
import { GifBuilderService } from "./infrastructure/image/gif-builder.service";
import { VideoEngine } from "./infrastructure/engines/video.engine";
import { ImageEngine } from "./infrastructure/engines/image.engine";
import { AudioEngine } from "./infrastructure/engines/audio.engine";
import { DocumentEngine } from "./infrastructure/engines/document.engine";
import { ArchiveEngine } from "./infrastructure/engines/archive.engine";
import { EngineManager } from "./infrastructure/engines/engine.manager";
import { JobQueue } from "./infrastructure/queue/job.queue";
import { TaskWorker } from "./infrastructure/queue/task.worker";
import { createJobHandlers } from "./infrastructure/queue/job.handlers";
import { JobRecoveryCron } from "./infrastructure/cron/job-recovery.cron";
import { MaintenanceCron } from "./infrastructure/cron/maintenance.cron";
import { TaskProgressService } from "./application/services/task-progress.service";
import { SpeechRecognitionService } from "./application/services/speech-recognition.service";
import { AudioProcessingPipeline } from "./application/pipeline/audio.processing.pipeline";
import { LoadAudioStep } from "./application/steps/load.audio.step";
import { PreprocessAudioStep } from "./application/steps/preprocess.audio.step";
import { SegmentAudioStep } from "./application/steps/segment.audio.step";
import { TranscriptionStep } from "./application/steps/transcription.step";
import { GenerateOutputsStep } from "./application/steps/generate.outputs.step";
import { CreateConversionTaskUseCase } from "./application/use-cases/create-conversion-task.use-case";
import { SubmitConversionUseCase } from "./application/use-cases/submit-conversion.use-case";
import { SubmitFormatConversionUseCase } from "./application/use-cases/submit-format-conversion.use-case";
import { SubmitAudioTranscriptionUseCase } from "./application/use-cases/submit-audio-transcription.use-case";
import { SubmitImagesToGifUseCase } from "./application/use-cases/submit-images-to-gif.use-case";
import { ProcessConversionTaskUseCase } from "./application/use-cases/process-conversion-task.use-case";
import { ProcessAudioTranscriptionUseCase } from "./application/use-cases/process-audio-transcription.use-case";
import { ProcessImagesToGifUseCase } from "./application/use-cases/process-images-to-gif.use-case";
import { ListTasksUseCase } from "./application/use-cases/list-tasks.use-case";
import { GetTaskStatusUseCase } from "./application/use-cases/get-task-status.use-case";
import { GetTaskResultUseCase } from "./application/use-cases/get-task-result.use-case";
import { GetTaskDownloadUseCase } from "./application/use-cases/get-task-download.use-case";
import { BuildBatchArchiveUseCase } from "./application/use-cases/build-batch-archive.use-case";
import { CancelTaskUseCase } from "./application/use-cases/cancel-task.use-case";
import { DetectFileTypeUseCase } from "./application/use-cases/detect-file-type.use-case";
import { DeleteTaskUseCase } from "./application/use-cases/delete-task.use-case";
import { GetQueueOverviewUseCase } from "./application/use-cases/get-queue-overview.use-case";
import { ClearCompletedTasksUseCase } from "./application/use-cases/clear-completed-tasks.use-case";
import { GetConversionHistoryUseCase } from "./application/use-cases/get-conversion-history.use-case";
import { GetHistoryStatsUseCase } from "./application/use-cases/get-history-stats.use-case";
import { CleanupTempFilesUseCase } from "./application/use-cases/cleanup-temp-files.use-case";
import { CleanupOldFilesUseCase } from "./application/use-cases/cleanup-old-files.use-case";
import { ResumeIncompleteJobsUseCase } from "./application/use-cases/resume-incomplete-jobs.use-case";
import { TaskController } from "./presentation/controllers/task.controller";
import { MediaController } from "./presentation/controllers/media.controller";
import { QueueController } from "./presentation/controllers/queue.controller";
import { EngineController } from "./presentation/controllers/engine.controller";
import { createApp } from "./app";

interface RunningService {
  server: Server;
  worker: TaskWorker | null;
  crons: Array<{ stop(): void }>;
}

let service: RunningService | null = null;

async function main() {
  try {
    const db = await connectToMongoDB(config.mongodb);

    // Initialize repositories
    const taskRepository = new ConversionTaskRepository(db);
    const historyRepository = new ConversionHistoryRepository(db);
    const queueJobRepository = new QueueJobRepository(db);

    // Initialize infrastructure
    const storage = new MediaStorage(config.mediaRoot);
    await storage.ensureDirectories();

    const ffmpeg = new FfmpegRunner(config.binaries);
    const audioProcessor = new FfmpegAudioProcessor(ffmpeg);
    const transcriptionProviders = [
      new OpenAITranscriptionProvider(config.speech.openaiApiKey, config.speech.whisperModel),
      new GoogleSpeechProvider(config.speech.googleApiKey),
    ];
    const engineManager = new EngineManager([
      new VideoEngine(ffmpeg),
      new ImageEngine(),
      new AudioEngine(ffmpeg),
      new DocumentEngine(config.binaries.soffice),
      new ArchiveEngine(config.binaries),
    ]);
    const taskQueue = new JobQueue(queueJobRepository);

    // Speech pipeline
    const speechRecognition = new SpeechRecognitionService(
      transcriptionProviders,
      audioProcessor,
      config.speech.preferredEngine
    );
    const pipeline = new AudioProcessingPipeline([
      new LoadAudioStep(audioProcessor, config.speech.maxAudioDurationSec),
      new PreprocessAudioStep(audioProcessor),
      new SegmentAudioStep(audioProcessor),
      new TranscriptionStep(speechRecognition),
      new GenerateOutputsStep(storage),
    ]);

    // Initialize use cases
    const taskProgress = new TaskProgressService(taskRepository, historyRepository);
    const createTask = new CreateConversionTaskUseCase(taskRepository, taskQueue, taskProgress);
    const processConversion = new ProcessConversionTaskUseCase(
      taskRepository,
      taskProgress,
      engineManager,
      storage,
      new HttpFileDownloader()
    );
    const processAudio = new ProcessAudioTranscriptionUseCase(taskRepository, taskProgress, pipeline, storage);
    const processGif = new ProcessImagesToGifUseCase(
      taskRepository,
      taskProgress,
      new GifBuilderService(ffmpeg),
      storage
    );
    const cleanupOldFiles = new CleanupOldFilesUseCase(
      new CleanupTempFilesUseCase(),
      taskRepository,
      storage,
      config.cleanup
    );
    const resumeIncompleteJobs = new ResumeIncompleteJobsUseCase(queueJobRepository, taskProgress, config.queue.resultExpiresMs);

    // Initialize controllers
    const taskController = new TaskController(
      new SubmitConversionUseCase(storage, createTask),
      new ListTasksUseCase(taskRepository),
      new GetTaskStatusUseCase(taskRepository),
      new GetTaskResultUseCase(taskRepository, storage),
      new GetTaskDownloadUseCase(taskRepository, storage),
      new BuildBatchArchiveUseCase(taskRepository, storage),
      new CancelTaskUseCase(taskRepository, taskQueue, taskProgress),
      new DeleteTaskUseCase(taskRepository, taskQueue, storage)
    );
    const mediaController = new MediaController(
      new SubmitAudioTranscriptionUseCase(storage, createTask),
      new SubmitImagesToGifUseCase(storage, createTask),
      new SubmitFormatConversionUseCase(storage, createTask)
    );
    const queueController = new QueueController(
      new GetQueueOverviewUseCase(taskRepository),
      new ClearCompletedTasksUseCase(taskRepository, storage),
      new GetConversionHistoryUseCase(historyRepository),
      new GetHistoryStatsUseCase(historyRepository)
    );
    const engineController = new EngineController(engineManager, new DetectFileTypeUseCase(engineManager));

    const app = createApp({
      taskController,
      mediaController,
      queueController,
      engineController,
      mediaRoot: config.mediaRoot,
      jwtSecret: config.jwt.secret,
    });

    // Background worker
    let worker: TaskWorker | null = null;
    if (config.queue.workerEnabled) {
      worker = new TaskWorker(
        queueJobRepository,
        createJobHandlers({
          runConversion: (params) => processConversion.execute(params),
          transcribeAudio: (params) => processAudio.execute(params),
          buildGif: (params) => processGif.execute(params),
          cleanup: () => cleanupOldFiles.execute(),
        }),
        {
          queues: config.queue.queues,
          concurrency: config.queue.concurrency,
          pollIntervalMs: config.queue.pollIntervalMs,
        }
      );
      worker.start();
    } else {
      console.log("Worker disabled, tasks will wait for another process to consume them");
    }

    const jobRecoveryCron = new JobRecoveryCron(resumeIncompleteJobs);
    jobRecoveryCron.start();
    const maintenanceCron = new MaintenanceCron(taskQueue);
    maintenanceCron.start();

    // Start server
    const server = app.listen(config.port, () => {
      console.log(`Media conversion service running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`API endpoints: http://localhost:${config.port}/api`);
    });

    service = { server, worker, crons: [jobRecoveryCron, maintenanceCron] };
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  if (service) {
    const { server, worker, crons } = service;
    crons.forEach((cron) => cron.stop());
    server.close();
    if (worker) {
      await worker.stop();
    }
  }
  await closeMongoDBConnection();
  process.exit(0);
}

// Handle graceful shutdown
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

void main();
