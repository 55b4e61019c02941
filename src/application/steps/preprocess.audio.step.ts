import { join } from "path";
import { IAudioProcessor } from "../../domain/interfaces/iaudio.processor";
import { AudioProcessingContext } from "../pipeline/audio.processing.context";
import { IAudioProcessingStep } from "../pipeline/audio.processing.step";

export class PreprocessAudioStep implements IAudioProcessingStep {
  constructor(private audioProcessor: IAudioProcessor) {}

  async execute(context: AudioProcessingContext): Promise<AudioProcessingContext> {
    await context.reportProgress(15);

    const preparedPath = join(context.workDir, "prepared.wav");
    await this.audioProcessor.prepareForSpeech(context.inputPath, preparedPath, {
      enhanceSpeech: context.options.enhanceSpeech,
      signal: context.signal,
    });
    return { ...context, preparedPath };
  }
}
