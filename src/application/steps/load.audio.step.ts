import { access } from "fs/promises";
import { IAudioProcessor } from "../../domain/interfaces/iaudio.processor";
import { AudioProcessingContext } from "../pipeline/audio.processing.context";
import { IAudioProcessingStep } from "../pipeline/audio.processing.step";

export class LoadAudioStep implements IAudioProcessingStep {
  constructor(
    private audioProcessor: IAudioProcessor,
    private maxDurationSec: number
  ) {}

  async execute(context: AudioProcessingContext): Promise<AudioProcessingContext> {
    await context.reportProgress(5);

    try {
      await access(context.inputPath);
    } catch {
      throw new Error(`Audio file not found: ${context.task.originalFilename ?? context.inputPath}`);
    }

    const durationSec = await this.audioProcessor.probeDuration(context.inputPath, context.signal);
    if (durationSec > this.maxDurationSec) {
      throw new Error(`Audio is too long: ${Math.round(durationSec)}s (maximum ${this.maxDurationSec}s)`);
    }

    console.log(`[LoadAudioStep] Loaded ${context.inputPath} (${durationSec.toFixed(2)}s)`);
    return { ...context, durationSec };
  }
}
