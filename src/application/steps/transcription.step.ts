import { AudioProcessingContext } from "../pipeline/audio.processing.context";
import { IAudioProcessingStep } from "../pipeline/audio.processing.step";
import { SpeechRecognitionService } from "../services/speech-recognition.service";

export const TRANSCRIPTION_PROGRESS_START = 40;
const TRANSCRIPTION_PROGRESS_SPAN = 0.4;

export function segmentProgress(done: number, total: number): number {
  return TRANSCRIPTION_PROGRESS_START + Math.floor((done / total) * 100 * TRANSCRIPTION_PROGRESS_SPAN);
}

export class TranscriptionStep implements IAudioProcessingStep {
  constructor(private speechRecognition: SpeechRecognitionService) {}

  async execute(context: AudioProcessingContext): Promise<AudioProcessingContext> {
    const { segments, durationSec } = context;
    if (!segments || durationSec === undefined) {
      throw new Error("TranscriptionStep needs audio segments");
    }

    await context.reportProgress(TRANSCRIPTION_PROGRESS_START);
    const transcription = await this.speechRecognition.transcribeSegments({
      segments,
      durationSec,
      options: context.options,
      workDir: context.workDir,
      signal: context.signal,
      onSegmentDone: (done, total) => context.reportProgress(segmentProgress(done, total)),
    });

    if (transcription.results.length === 0) {
      throw new Error("No speech was recognized in the audio");
    }

    console.log(
      `[TranscriptionStep] ${transcription.results.length}/${segments.length} segment(s) recognized with ${transcription.engineUsed}` +
        ` (${transcription.fallbackSegments} via fallback)`
    );
    return { ...context, transcription };
  }
}
