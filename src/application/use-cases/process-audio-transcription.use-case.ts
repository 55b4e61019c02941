import { errorMessage } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { isFinished } from "../../domain/utils/conversion-task.state";
import { parseAudioTranscriptionOptions } from "../../domain/utils/transcription.options";
import { JobContext } from "../../infrastructure/queue/task.worker";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { AudioProcessingPipeline } from "../pipeline/audio.processing.pipeline";
import { isLastRun, removeInputFiles } from "../services/task-job.helpers";
import { TaskProgressService } from "../services/task-progress.service";

export interface ProcessAudioTranscriptionParams {
  taskId: string;
  context: JobContext;
}

/**
 * Runs the speech pipeline for an audio_to_text task and stores the
 * transcript and its output file links on the task.
 */
export class ProcessAudioTranscriptionUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private taskProgress: TaskProgressService,
    private pipeline: AudioProcessingPipeline,
    private storage: MediaStorage
  ) {}

  async execute(params: ProcessAudioTranscriptionParams): Promise<void> {
    const { taskId, context } = params;
    const task = await this.taskRepository.findById(taskId);
    if (!task || isFinished(task)) {
      console.log(`[ProcessAudioTranscription] Nothing to do for task ${taskId}`);
      return;
    }

    const started = await this.taskProgress.start(task);
    if (!started) {
      return;
    }

    const input = started.inputFiles[0];
    const startedAt = Date.now();
    const workDir = await this.storage.createWorkDir(`stt-${taskId}`);

    try {
      if (!input) {
        throw new Error("Audio file is missing");
      }

      const result = await this.pipeline.run({
        task: started,
        options: parseAudioTranscriptionOptions(started.conversionParams),
        inputPath: input.path,
        workDir,
        signal: context.signal,
        reportProgress: (progress) => this.taskProgress.progress(taskId, progress),
      });

      const { transcription, outputFiles, durationSec } = result;
      if (!transcription || !outputFiles || durationSec === undefined || result.text === undefined) {
        throw new Error("Audio pipeline finished without a transcription");
      }

      const outputPath = {
        txt: outputFiles.txtPath,
        srt: outputFiles.srtPath,
        json: outputFiles.jsonPath,
      }[result.options.outputFormat];
      const outputSize = (await this.storage.fileSize(outputPath)) ?? 0;

      await this.taskProgress.complete(started, {
        outputPath,
        outputSize,
        metadata: {
          transcription: result.text,
          output_files: {
            txt_url: outputFiles.txtUrl,
            srt_url: outputFiles.srtUrl,
            json_url: outputFiles.jsonUrl,
          },
          duration: durationSec,
          language: transcription.results[0]?.language ?? "unknown",
          segments_count: transcription.results.length,
          processing_time: Math.round((Date.now() - startedAt) / 10) / 100,
          engine_used: transcription.engineUsed,
          fallback_segments: transcription.fallbackSegments,
        },
      });
      console.log(`[ProcessAudioTranscription] Task ${taskId} transcribed ${transcription.results.length} segment(s)`);
      await removeInputFiles(this.storage, started.inputFiles);
    } catch (error: unknown) {
      console.error(`[ProcessAudioTranscription] Task ${taskId} failed on attempt ${context.attempt}:`, error);
      if (isLastRun(context)) {
        await this.taskProgress.fail(taskId, errorMessage(error, "Transcription failed"));
        await removeInputFiles(this.storage, started.inputFiles);
      }
      throw error;
    } finally {
      await this.storage.remove(workDir);
    }
  }
}
