import { join } from "path";
import { AudioSegment } from "../../domain/entities/transcription";
import { IAudioProcessor } from "../../domain/interfaces/iaudio.processor";
import { computeSpeechRanges } from "../../domain/utils/speech.ranges";
import { AudioProcessingContext } from "../pipeline/audio.processing.context";
import { IAudioProcessingStep } from "../pipeline/audio.processing.step";

export const MIN_SILENCE_SEC = 1.0;
// Silence threshold relative to the mean level of the recording
export const SILENCE_OFFSET_DB = 40;

/**
 * Splits the prepared audio into speech ranges when silence removal is on.
 * Otherwise, or when nothing usable is found, the whole file is one segment.
 */
export class SegmentAudioStep implements IAudioProcessingStep {
  constructor(private audioProcessor: IAudioProcessor) {}

  async execute(context: AudioProcessingContext): Promise<AudioProcessingContext> {
    const { preparedPath, durationSec } = context;
    if (!preparedPath || durationSec === undefined) {
      throw new Error("SegmentAudioStep needs the prepared audio and its duration");
    }

    const whole: AudioSegment[] = [{ path: preparedPath, startSec: 0, endSec: durationSec }];
    if (!context.options.removeSilence) {
      return { ...context, segments: whole };
    }

    await context.reportProgress(25);
    const segments = await this.splitOnSilence(context, preparedPath, durationSec);
    console.log(`[SegmentAudioStep] Using ${segments.length} segment(s)`);
    return { ...context, segments: segments.length > 0 ? segments : whole };
  }

  private async splitOnSilence(context: AudioProcessingContext, path: string, durationSec: number): Promise<AudioSegment[]> {
    const { meanDb } = await this.audioProcessor.measureVolume(path, context.signal);
    if (!Number.isFinite(meanDb)) {
      return [];
    }

    const silences = await this.audioProcessor.detectSilences(path, {
      minSilenceSec: MIN_SILENCE_SEC,
      thresholdDb: meanDb - SILENCE_OFFSET_DB,
      signal: context.signal,
    });
    if (silences.length === 0) {
      return [];
    }

    const ranges = computeSpeechRanges(silences, durationSec);
    const segments: AudioSegment[] = [];
    for (let i = 0; i < ranges.length; i++) {
      const segmentPath = join(context.workDir, `segment_${String(i).padStart(4, "0")}.wav`);
      await this.audioProcessor.extractSegment(path, segmentPath, ranges[i], context.signal);
      segments.push({ path: segmentPath, startSec: ranges[i].startSec, endSec: ranges[i].endSec });
    }
    return segments;
  }
}
