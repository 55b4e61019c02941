import { join } from "path";
import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { IGifBuilder } from "../../domain/interfaces/igif.builder";
import { isFinished } from "../../domain/utils/conversion-task.state";
import {
  FrameSize,
  FrameSource,
  GIF_MIN_IMAGES,
  applyPingPong,
  calculateOutputSize,
  parseImagesToGifOptions,
  sortFrames,
} from "../../domain/utils/gif.frames";
import { formatFileTimestamp } from "../../domain/utils/transcript.format";
import { JobContext } from "../../infrastructure/queue/task.worker";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { isLastRun, removeInputFiles } from "../services/task-job.helpers";
import { TaskProgressService } from "../services/task-progress.service";

export interface ProcessImagesToGifParams {
  taskId: string;
  context: JobContext;
}

export function frameProgress(index: number, total: number): number {
  return 10 + Math.floor((index * 60) / total);
}

export class ProcessImagesToGifUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskProgress: TaskProgressService,
    private gifBuilder: IGifBuilder,
    private storage: MediaStorage
  ) {}

  async execute(params: ProcessImagesToGifParams): Promise<void> {
    const { taskId, context } = params;
    const task = await this.taskRepository.findById(taskId);
    if (!task || isFinished(task)) {
      console.log(`[ProcessImagesToGif] Nothing to do for task ${taskId}`);
      return;
    }

    const started = await this.taskProgress.start(task);
    if (!started) {
      return;
    }

    const workDir = await this.storage.createWorkDir(`gif-${taskId}`);
    try {
      await this.taskProgress.progress(taskId, 5);
      const options = parseImagesToGifOptions(started.conversionParams);
      const frames = sortFrames<FrameSource>(started.inputFiles, options.sortOrder);

      const sourceSize = await this.firstReadableSize(frames);
      const size = calculateOutputSize(sourceSize, options.outputSize);

      const prepared: string[] = [];
      for (let i = 0; i < frames.length; i++) {
        context.signal.throwIfAborted();
        const framePath = join(workDir, `frame_${String(i).padStart(4, "0")}.png`);
        try {
          await this.gifBuilder.prepareFrame(frames[i].path, framePath, size);
          prepared.push(framePath);
        } catch (error: unknown) {
          console.warn(`[ProcessImagesToGif] Skipping unreadable image ${frames[i].originalName}: ${errorMessage(error)}`);
        }
        await this.taskProgress.progress(taskId, frameProgress(i, frames.length));
      }

      if (prepared.length < GIF_MIN_IMAGES) {
        throw new Error(`At least ${GIF_MIN_IMAGES} readable images are required, got ${prepared.length}`);
      }

      const sequence = options.pingpong ? applyPingPong(prepared) : prepared;
      await this.taskProgress.progress(taskId, 75);

      const outputPath = this.storage.pathFor("outputs", `animation_${taskId}_${formatFileTimestamp(new Date())}.gif`);
      await this.gifBuilder.assemble(sequence, outputPath, {
        frameDurationSec: options.frameDurationSec,
        loop: options.loop,
        colors: options.colors,
        optimize: options.optimize,
        signal: context.signal,
      });

      const outputSize = (await this.storage.fileSize(outputPath)) ?? 0;
      await this.taskProgress.complete(started, {
        outputPath,
        outputSize,
        metadata: {
          output_file: this.storage.urlFor(outputPath),
          frame_count: sequence.length,
          duration: Math.round(sequence.length * options.frameDurationSec * 1000) / 1000,
          file_size: outputSize,
          width: size.width,
          height: size.height,
        },
      });
      console.log(`[ProcessImagesToGif] Task ${taskId} built a ${sequence.length}-frame GIF`);
      await removeInputFiles(this.storage, started.inputFiles);
    } catch (error: unknown) {
      console.error(`[ProcessImagesToGif] Task ${taskId} failed on attempt ${context.attempt}:`, error);
      if (isLastRun(context)) {
        await this.taskProgress.fail(taskId, errorMessage(error, "GIF creation failed"));
        await removeInputFiles(this.storage, started.inputFiles);
      }
      throw error;
    } finally {
      await this.storage.remove(workDir);
    }
  }

  private async firstReadableSize(frames: FrameSource[]): Promise<FrameSize> {
    for (const frame of frames) {
      try {
        return await this.gifBuilder.readFrameSize(frame.path);
      } catch (error: unknown) {
        console.warn(`[ProcessImagesToGif] Cannot read size of ${frame.originalName}: ${errorMessage(error)}`);
      }
    }
    throw new Error("None of the uploaded images could be read");
  }
}
