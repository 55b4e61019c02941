import { TimeRange } from "../utils/speech.ranges";

export interface VolumeStats {
  meanDb: number;
  maxDb: number;
}

export interface SpeechPreparationOptions {
  enhanceSpeech: boolean;
  signal?: AbortSignal;
}

export interface SilenceDetectionOptions {
  minSilenceSec: number;
  thresholdDb: number;
  signal?: AbortSignal;
}

/** Audio operations the transcription pipeline needs from the media toolchain. */
export interface IAudioProcessor {
  probeDuration(path: string, signal?: AbortSignal): Promise<number>;
  measureVolume(path: string, signal?: AbortSignal): Promise<VolumeStats>;
  /** Writes a mono 16 kHz PCM WAV suited to speech recognition. */
  prepareForSpeech(inputPath: string, outputPath: string, options: SpeechPreparationOptions): Promise<void>;
  detectSilences(path: string, options: SilenceDetectionOptions): Promise<TimeRange[]>;
  extractSegment(inputPath: string, outputPath: string, range: TimeRange, signal?: AbortSignal): Promise<void>;
}
