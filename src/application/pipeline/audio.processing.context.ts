import { ConversionTask } from "../../domain/entities/conversion-task";
import {
  AudioSegment,
  SegmentsTranscriptionResult,
  TranscriptionOutputFiles,
} from "../../domain/entities/transcription";
import { AudioTranscriptionOptions } from "../../domain/utils/transcription.options";

export interface AudioProcessingContext {
  task: ConversionTask;
  options: AudioTranscriptionOptions;
  inputPath: string;
  workDir: string; // Scratch directory removed after the run
  signal: AbortSignal;
  reportProgress: (progress: number) => Promise<void>;

  durationSec?: number;
  preparedPath?: string;
  segments?: AudioSegment[];
  transcription?: SegmentsTranscriptionResult;
  text?: string;
  outputFiles?: TranscriptionOutputFiles;
}
