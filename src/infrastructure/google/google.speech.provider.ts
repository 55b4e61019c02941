import { readFile } from "fs/promises";
import { TranscriptionQuality } from "../../domain/enums/stt.engine";
import {
  ITranscriptionProvider,
  SpeechTranscription,
  TranscriptionOptions,
} from "../../domain/interfaces/itranscription.provider";
import { toGoogleLanguage } from "../../domain/utils/language.validator";

const RECOGNIZE_URL = "https://speech.googleapis.com/v1/speech:recognize";
const DEFAULT_CONFIDENCE = 0.9;

// Request timeouts per quality; high quality waits as long as it takes
const TIMEOUTS_MS: Record<TranscriptionQuality, number | null> = {
  fast: 15000,
  standard: 30000,
  high: null,
};

interface RecognizedAlternative {
  transcript: string;
  confidence?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First alternative of every result in a `speech:recognize` response. */
export function readRecognizeResponse(body: unknown): RecognizedAlternative[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    return [];
  }
  const alternatives: RecognizedAlternative[] = [];
  for (const result of body.results) {
    if (!isRecord(result) || !Array.isArray(result.alternatives)) {
      continue;
    }
    const first: unknown = result.alternatives[0];
    if (isRecord(first) && typeof first.transcript === "string") {
      alternatives.push({
        transcript: first.transcript,
        confidence: typeof first.confidence === "number" ? first.confidence : undefined,
      });
    }
  }
  return alternatives;
}

/**
 * Google Cloud Speech-to-Text over the REST API with an API key.
 * Expects mono 16 kHz LINEAR16 WAV of at most about a minute.
 */
export class GoogleSpeechProvider implements ITranscriptionProvider {
  readonly engine = "google";

  constructor(private apiKey: string | undefined, private fetchImpl: typeof fetch = fetch) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async transcribeFile(audioPath: string, options: TranscriptionOptions): Promise<SpeechTranscription> {
    if (!this.apiKey) {
      throw new Error("Google Speech API key is not configured");
    }

    const audio = await readFile(audioPath);
    const languageCode = toGoogleLanguage(options.language);
    const response = await this.fetchImpl(`${RECOGNIZE_URL}?key=${encodeURIComponent(this.apiKey)}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        config: { encoding: "LINEAR16", sampleRateHertz: 16000, languageCode },
        audio: { content: audio.toString("base64") },
      }),
      signal: this.requestSignal(options),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Google Speech request failed with ${response.status}: ${detail.slice(0, 200)}`);
    }

    const alternatives = readRecognizeResponse(await response.json());
    const text = alternatives
      .map((alternative) => alternative.transcript.trim())
      .filter((part) => part.length > 0)
      .join(" ");

    return {
      text,
      language: languageCode,
      confidence: alternatives[0]?.confidence ?? DEFAULT_CONFIDENCE,
    };
  }

  private requestSignal(options: TranscriptionOptions): AbortSignal | undefined {
    const timeoutMs = TIMEOUTS_MS[options.quality];
    const signals: AbortSignal[] = [];
    if (options.signal) {
      signals.push(options.signal);
    }
    if (timeoutMs !== null) {
      signals.push(AbortSignal.timeout(timeoutMs));
    }
    if (signals.length === 0) {
      return undefined;
    }
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
  }
}
