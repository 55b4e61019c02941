import { ConversionTask, TaskInputFile } from "../../domain/entities/conversion-task";
import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { DownloadedFile, IFileDownloader } from "../../domain/interfaces/ifile.downloader";
import { isFinished } from "../../domain/utils/conversion-task.state";
import { EngineManager } from "../../infrastructure/engines/engine.manager";
import { JobContext } from "../../infrastructure/queue/task.worker";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { isLastRun, removeInputFiles } from "../services/task-job.helpers";
import { TaskProgressService } from "../services/task-progress.service";

export interface ProcessConversionTaskParams {
  taskId: string;
  context: JobContext;
}

// Engine progress 0-100 lands in 20-90 on the task
export function engineProgress(progress: number): number {
  return 20 + Math.floor(progress * 0.7);
}

export class ProcessConversionTaskUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskProgress: TaskProgressService,
    private engineManager: EngineManager,
    private storage: MediaStorage,
    private downloader: IFileDownloader
  ) {}

  async execute(params: ProcessConversionTaskParams): Promise<void> {
    const { taskId, context } = params;
    const task = await this.taskRepository.findById(taskId);
    if (!task) {
      console.warn(`[ProcessConversionTask] Task ${taskId} no longer exists, skipping`);
      return;
    }
    if (isFinished(task)) {
      console.log(`[ProcessConversionTask] Task ${taskId} is already ${task.status}, skipping`);
      return;
    }

    const started = await this.taskProgress.start(task);
    if (!started) {
      return;
    }

    let inputFiles = started.inputFiles;
    try {
      const input = await this.resolveInput(started, context.signal);
      inputFiles = input.inputFiles;
      await this.taskProgress.progress(taskId, 20);

      const outputPath = this.storage.pathFor("results", `task_${taskId}_result.${started.targetFormat}`);
      const reporter = this.taskProgress.createReporter(taskId, engineProgress);
      const result = await this.engineManager.convertFile({
        inputPath: input.path,
        filename: input.originalName,
        outputPath,
        outputFormat: started.targetFormat,
        params: started.conversionParams,
        signal: context.signal,
        onProgress: (progress) => reporter.report(progress),
      });
      await reporter.flush();
      await this.taskProgress.progress(taskId, 95);

      const outputSize = (await this.storage.fileSize(result.outputPath)) ?? 0;
      await this.taskProgress.complete(started, {
        outputPath: result.outputPath,
        outputSize,
        metadata: {
          ...result.info,
          engine_type: result.engineType,
          output_format: started.targetFormat,
          output_file_size: outputSize,
        },
      });
      console.log(`[ProcessConversionTask] Task ${taskId} converted to ${started.targetFormat} (${outputSize} bytes)`);
      await removeInputFiles(this.storage, inputFiles);
    } catch (error: unknown) {
      console.error(`[ProcessConversionTask] Task ${taskId} failed on attempt ${context.attempt}:`, error);
      if (isLastRun(context)) {
        await this.taskProgress.fail(taskId, errorMessage(error, "Conversion failed"));
        await removeInputFiles(this.storage, inputFiles);
      }
      throw error;
    }
  }

  /** Local input of the task, downloading URL sources on first use. */
  private async resolveInput(
    task: ConversionTask,
    signal: AbortSignal
  ): Promise<{ path: string; originalName: string; inputFiles: TaskInputFile[] }> {
    const existing = task.inputFiles[0];
    if (existing && (await this.storage.exists(existing.path))) {
      return { path: existing.path, originalName: existing.originalName, inputFiles: task.inputFiles };
    }
    if (task.sourceType === "upload" || !task.sourceUrl) {
      throw new Error("Input file is missing");
    }

    await this.taskProgress.progress(task.id, 10);
    const workDir = await this.storage.createWorkDir(`download-${task.id}`);
    let downloaded: DownloadedFile;
    try {
      downloaded = await this.downloader.download(task.sourceUrl, workDir, signal);
    } catch (error: unknown) {
      await this.storage.remove(workDir);
      throw error;
    }
    const inputFiles: TaskInputFile[] = [{ path: downloaded.path, originalName: downloaded.filename, size: downloaded.size }];

    await this.taskRepository.updateIfStatus(task.id, ["running"], {
      inputFiles,
      originalFilename: task.originalFilename ?? downloaded.filename,
      fileSize: downloaded.size,
      contentType: task.contentType ?? downloaded.contentType,
    });
    return { path: downloaded.path, originalName: downloaded.filename, inputFiles };
  }
}
