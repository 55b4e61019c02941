import { join } from "path";
import { AudioSegment, SegmentTranscription, SegmentsTranscriptionResult } from "../../domain/entities/transcription";
import { SttEngine } from "../../domain/enums/stt.engine";
import { errorMessage } from "../../domain/errors/app.error";
import { IAudioProcessor } from "../../domain/interfaces/iaudio.processor";
import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { otherEngine, selectSttEngine } from "../../domain/utils/stt-engine.selector";
import { AudioTranscriptionOptions } from "../../domain/utils/transcription.options";

// Google's synchronous recognize endpoint rejects longer audio
export const GOOGLE_MAX_SEGMENT_SEC = 50;
const DEFAULT_CONFIDENCE = 0.9;

export interface TranscribeSegmentsParams {
  segments: AudioSegment[];
  durationSec: number;
  options: AudioTranscriptionOptions;
  workDir: string;
  signal?: AbortSignal;
  onSegmentDone?: (done: number, total: number) => Promise<void>;
}

export class NoSpeechEngineError extends Error {
  constructor() {
    super("No speech recognition engine is available. Configure OPENAI_API_KEY or GOOGLE_SPEECH_API_KEY.");
    this.name = "NoSpeechEngineError";
  }
}

/**
 * Runs segments through the selected engine in order. A segment the primary
 * engine fails on is retried once with the other engine.
 */
export class SpeechRecognitionService {
  private providers = new Map<SttEngine, ITranscriptionProvider>();

  constructor(
    providers: ITranscriptionProvider[],
    private audioProcessor: IAudioProcessor,
    private preferredEngine: SttEngine
  ) {
    for (const provider of providers) {
      this.providers.set(provider.engine, provider);
    }
  }

  availableEngines(): Record<SttEngine, boolean> {
    return {
      whisper: this.providers.get("whisper")?.isAvailable() ?? false,
      google: this.providers.get("google")?.isAvailable() ?? false,
    };
  }

  selectEngine(durationSec: number, useWhisper: boolean): SttEngine | null {
    return selectSttEngine({
      durationSec,
      useWhisper,
      preferredEngine: this.preferredEngine,
      available: this.availableEngines(),
    });
  }

  async transcribeSegments(params: TranscribeSegmentsParams): Promise<SegmentsTranscriptionResult> {
    const primary = this.selectEngine(params.durationSec, params.options.useWhisper);
    if (!primary) {
      throw new NoSpeechEngineError();
    }
    const fallback = otherEngine(primary);
    const canFallBack = this.availableEngines()[fallback];
    console.log(`[SpeechRecognition] Transcribing ${params.segments.length} segment(s) with ${primary}`);

    const results: SegmentTranscription[] = [];
    let fallbackSegments = 0;

    for (let i = 0; i < params.segments.length; i++) {
      const segment = params.segments[i];
      let result: SegmentTranscription | null = null;

      try {
        result = await this.transcribeWith(primary, segment, i, params);
      } catch (error: unknown) {
        if (params.signal?.aborted) {
          throw error;
        }
        console.warn(`[SpeechRecognition] Segment ${i + 1} failed with ${primary}: ${errorMessage(error)}`);
        if (canFallBack) {
          try {
            result = await this.transcribeWith(fallback, segment, i, params);
            fallbackSegments++;
          } catch (fallbackError: unknown) {
            if (params.signal?.aborted) {
              throw fallbackError;
            }
            console.warn(`[SpeechRecognition] Segment ${i + 1} failed with ${fallback}: ${errorMessage(fallbackError)}`);
          }
        }
      }

      if (result && result.text.trim()) {
        results.push(result);
      }
      await params.onSegmentDone?.(i + 1, params.segments.length);
    }

    return { results, engineUsed: primary, fallbackSegments };
  }

  private async transcribeWith(
    engine: SttEngine,
    segment: AudioSegment,
    index: number,
    params: TranscribeSegmentsParams
  ): Promise<SegmentTranscription> {
    const provider = this.providers.get(engine);
    if (!provider) {
      throw new Error(`Speech engine ${engine} is not configured`);
    }

    let path = segment.path;
    if (engine === "google" && segment.endSec - segment.startSec > GOOGLE_MAX_SEGMENT_SEC) {
      path = join(params.workDir, `google_segment_${index}.wav`);
      await this.audioProcessor.extractSegment(
        segment.path,
        path,
        { startSec: 0, endSec: GOOGLE_MAX_SEGMENT_SEC },
        params.signal
      );
    }

    const response = await provider.transcribeFile(path, {
      language: params.options.language,
      quality: params.options.quality,
      signal: params.signal,
    });

    return {
      text: response.text.trim(),
      start: segment.startSec,
      end: segment.endSec,
      language: response.language ?? params.options.language,
      confidence: response.confidence ?? DEFAULT_CONFIDENCE,
    };
  }
}
