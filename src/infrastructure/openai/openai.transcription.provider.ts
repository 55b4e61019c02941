import OpenAI, { toFile } from "openai";
import { createReadStream } from "fs";
import { basename } from "path";
import streamToArray from "stream-to-array";
import {
  ITranscriptionProvider,
  SpeechTranscription,
  TranscriptionOptions,
} from "../../domain/interfaces/itranscription.provider";
import { toWhisperLanguage } from "../../domain/utils/language.validator";

// Whisper does not report a per-request confidence
const WHISPER_CONFIDENCE = 0.9;

function detectMimeType(buffer: Buffer): string {
  if (buffer.length < 4) {
    return "audio/wav";
  }
  // Check magic bytes for common audio formats
  if (buffer[0] === 0xff && (buffer[1] & 0xe0) === 0xe0) {
    return "audio/mpeg";
  }
  if (buffer.subarray(0, 3).toString("latin1") === "ID3") {
    return "audio/mpeg";
  }
  const header = buffer.subarray(0, 4).toString("latin1");
  if (header === "OggS") {
    return "audio/ogg";
  }
  if (header === "fLaC") {
    return "audio/flac";
  }
  return "audio/wav";
}

export class OpenAITranscriptionProvider implements ITranscriptionProvider {
  readonly engine = "whisper";
  private client: OpenAI | null;

  constructor(private apiKey: string | undefined, private model: string) {
    this.client = apiKey ? new OpenAI({ apiKey }) : null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async transcribeFile(audioPath: string, options: TranscriptionOptions): Promise<SpeechTranscription> {
    if (!this.client) {
      throw new Error("OpenAI API key is not configured");
    }

    const parts = await streamToArray(createReadStream(audioPath));
    const audioBuffer = Buffer.concat(parts.filter((part): part is Buffer => Buffer.isBuffer(part)));
    if (audioBuffer.length === 0) {
      throw new Error("Audio buffer is empty - file may be corrupted or empty");
    }

    const mimeType = detectMimeType(audioBuffer);
    const file = await toFile(audioBuffer, basename(audioPath), { type: mimeType });
    const language = toWhisperLanguage(options.language);

    try {
      const response = await this.client.audio.transcriptions.create(
        {
          model: this.model,
          file,
          response_format: "verbose_json",
          ...(language ? { language } : {}),
        },
        { signal: options.signal }
      );

      const detected = "language" in response && typeof response.language === "string" ? response.language : undefined;
      return {
        text: response.text.trim(),
        language: detected ?? language,
        confidence: WHISPER_CONFIDENCE,
      };
    } catch (error: unknown) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      console.error(`[OpenAITranscriptionProvider] Transcription failed for ${basename(audioPath)} (status ${status ?? "n/a"}):`, error);
      throw error;
    }
  }
}
