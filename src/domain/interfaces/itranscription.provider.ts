import { SttEngine, TranscriptionQuality } from "../enums/stt.engine";

export interface TranscriptionOptions {
  language?: string; // Locale code as submitted, e.g. "en-US" or "auto"
  quality: TranscriptionQuality;
  signal?: AbortSignal;
}

export interface SpeechTranscription {
  text: string;
  language?: string;
  confidence?: number;
}

export interface ITranscriptionProvider {
  readonly engine: SttEngine;
  isAvailable(): boolean;
  transcribeFile(audioPath: string, options: TranscriptionOptions): Promise<SpeechTranscription>;
}
