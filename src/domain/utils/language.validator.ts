/**
 * Speech language codes accepted by the transcription API.
 * "auto" lets the engine detect the language where it can.
 */
export const SUPPORTED_SPEECH_LANGUAGES = [
  "auto",
  "ru-RU",
  "en-US",
  "en-GB",
  "es-ES",
  "fr-FR",
  "de-DE",
  "it-IT",
  "pt-BR",
  "zh-CN",
  "ja-JP",
  "ko-KR",
] as const;
export type SpeechLanguage = typeof SUPPORTED_SPEECH_LANGUAGES[number];

export const DEFAULT_GOOGLE_LANGUAGE = "ru-RU";

export function isSupportedSpeechLanguage(lang: unknown): lang is SpeechLanguage {
  return typeof lang === "string" && SUPPORTED_SPEECH_LANGUAGES.some((code) => code === lang);
}

/**
 * Maps a locale code to the ISO-639-1 code the whisper API takes.
 * Returns undefined for "auto" so the model detects the language.
 */
export function toWhisperLanguage(lang: string | undefined): string | undefined {
  if (!lang || lang === "auto") {
    return undefined;
  }
  const normalized = lang.toLowerCase();
  if (normalized.startsWith("ru")) {
    return "ru";
  }
  if (normalized.startsWith("en")) {
    return "en";
  }
  return normalized.split("-")[0];
}

/** Google needs an explicit locale; "auto" falls back to the service default. */
export function toGoogleLanguage(lang: string | undefined): string {
  if (!lang || lang === "auto") {
    return DEFAULT_GOOGLE_LANGUAGE;
  }
  return lang;
}
