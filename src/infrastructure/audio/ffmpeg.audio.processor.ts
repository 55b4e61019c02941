import {
  IAudioProcessor,
  SilenceDetectionOptions,
  SpeechPreparationOptions,
  VolumeStats,
} from "../../domain/interfaces/iaudio.processor";
import { TimeRange } from "../../domain/utils/speech.ranges";
import { FfmpegRunner } from "../ffmpeg/ffmpeg.runner";
import { parseSilenceDetect, parseVolumeDetect } from "./ffmpeg.output.parser";

// Peak level after normalisation, just under full scale
const NORMALIZE_HEADROOM_DB = 0.1;
const SPEECH_SAMPLE_RATE = 16000;

/**
 * Speech-oriented audio operations on top of ffmpeg.
 * Every output is mono 16 kHz signed 16-bit PCM WAV.
 */
export class FfmpegAudioProcessor implements IAudioProcessor {
  constructor(private ffmpeg: FfmpegRunner) {}

  async probeDuration(path: string, signal?: AbortSignal): Promise<number> {
    return this.ffmpeg.probeDuration(path, signal);
  }

  async measureVolume(path: string, signal?: AbortSignal): Promise<VolumeStats> {
    const { stderr } = await this.ffmpeg.run(["-i", path, "-af", "volumedetect", "-vn", "-f", "null", "-"], signal);
    return parseVolumeDetect(stderr);
  }

  async prepareForSpeech(inputPath: string, outputPath: string, options: SpeechPreparationOptions): Promise<void> {
    await this.ffmpeg.ensureAvailable();

    const filters: string[] = [];
    if (options.enhanceSpeech) {
      const { maxDb } = await this.measureVolume(inputPath, options.signal);
      const gain = -NORMALIZE_HEADROOM_DB - maxDb;
      if (Number.isFinite(gain) && Math.abs(gain) >= 0.01) {
        filters.push(`volume=${gain.toFixed(2)}dB`);
      }
      // Telephone band: keeps the voice, drops rumble and hiss
      filters.push("highpass=f=300", "lowpass=f=3400");
    }

    const args = ["-i", inputPath, "-vn"];
    if (filters.length > 0) {
      args.push("-af", filters.join(","));
    }
    args.push(...this.speechOutputArgs(), outputPath);

    console.log(`[FfmpegAudioProcessor] Preparing ${inputPath} (filters: ${filters.join(",") || "none"})`);
    await this.ffmpeg.run(args, options.signal);
  }

  async detectSilences(path: string, options: SilenceDetectionOptions): Promise<TimeRange[]> {
    const duration = await this.probeDuration(path, options.signal);
    const { stderr } = await this.ffmpeg.run(
      [
        "-i",
        path,
        "-af",
        `silencedetect=noise=${options.thresholdDb.toFixed(1)}dB:d=${options.minSilenceSec}`,
        "-f",
        "null",
        "-",
      ],
      options.signal
    );
    return parseSilenceDetect(stderr, duration);
  }

  async extractSegment(inputPath: string, outputPath: string, range: TimeRange, signal?: AbortSignal): Promise<void> {
    const length = Math.max(0, range.endSec - range.startSec);
    await this.ffmpeg.run(
      ["-ss", range.startSec.toFixed(3), "-t", length.toFixed(3), "-i", inputPath, ...this.speechOutputArgs(), outputPath],
      signal
    );
  }

  private speechOutputArgs(): string[] {
    return ["-ac", "1", "-ar", String(SPEECH_SAMPLE_RATE), "-c:a", "pcm_s16le"];
  }
}
