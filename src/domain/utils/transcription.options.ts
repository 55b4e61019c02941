import { ConversionParams } from "../entities/conversion-task";
import {
  TranscriptOutputFormat,
  TranscriptionQuality,
  isTranscriptOutputFormat,
  isTranscriptionQuality,
} from "../enums/stt.engine";
import { SpeechLanguage, isSupportedSpeechLanguage } from "./language.validator";
import { parseBooleanParam } from "./request.params";

export interface AudioTranscriptionOptions {
  language: SpeechLanguage;
  quality: TranscriptionQuality;
  outputFormat: TranscriptOutputFormat;
  enhanceSpeech: boolean;
  removeSilence: boolean;
  useWhisper: boolean;
}

export const AUDIO_UPLOAD_EXTENSIONS = ["mp3", "wav", "m4a", "flac", "ogg", "aac", "wma"] as const;
export const AUDIO_UPLOAD_MAX_BYTES = 200 * 1024 * 1024;

/** Reads options from request fields or stored params (snake_case keys). */
export function parseAudioTranscriptionOptions(source: Record<string, unknown>): AudioTranscriptionOptions {
  const language = source.language;
  const quality = source.quality;
  const outputFormat = source.output_format;
  return {
    language: isSupportedSpeechLanguage(language) ? language : "auto",
    quality: isTranscriptionQuality(quality) ? quality : "standard",
    outputFormat: isTranscriptOutputFormat(outputFormat) ? outputFormat : "txt",
    enhanceSpeech: parseBooleanParam(source.enhance_speech, true),
    removeSilence: parseBooleanParam(source.remove_silence, false),
    useWhisper: parseBooleanParam(source.use_whisper, true),
  };
}

export function audioTranscriptionOptionsToParams(options: AudioTranscriptionOptions): ConversionParams {
  return {
    language: options.language,
    quality: options.quality,
    output_format: options.outputFormat,
    enhance_speech: options.enhanceSpeech,
    remove_silence: options.removeSilence,
    use_whisper: options.useWhisper,
  };
}
