export const SttEngines = ["whisper", "google"] as const;
export type SttEngine = typeof SttEngines[number];

export const TranscriptionQualities = ["fast", "standard", "high"] as const;
export type TranscriptionQuality = typeof TranscriptionQualities[number];

export const TranscriptOutputFormats = ["txt", "srt", "json"] as const;
export type TranscriptOutputFormat = typeof TranscriptOutputFormats[number];

export function isSttEngine(value: unknown): value is SttEngine {
  return typeof value === "string" && SttEngines.some((engine) => engine === value);
}

export function isTranscriptionQuality(value: unknown): value is TranscriptionQuality {
  return typeof value === "string" && TranscriptionQualities.some((quality) => quality === value);
}

export function isTranscriptOutputFormat(value: unknown): value is TranscriptOutputFormat {
  return typeof value === "string" && TranscriptOutputFormats.some((format) => format === value);
}
