import { SttEngine } from "../enums/stt.engine";

export interface SttEngineSelectionInput {
  durationSec: number;
  useWhisper: boolean;
  preferredEngine: SttEngine;
  available: Record<SttEngine, boolean>;
}

// Short clips go to Google when no explicit preference applies
export const SHORT_AUDIO_THRESHOLD_SEC = 120;

/**
 * Picks the engine for a transcription run, or null when no engine is usable.
 */
export function selectSttEngine(input: SttEngineSelectionInput): SttEngine | null {
  const { available } = input;

  if (input.useWhisper) {
    if (available.whisper) return "whisper";
    if (available.google) return "google";
    return null;
  }

  if (available[input.preferredEngine]) {
    return input.preferredEngine;
  }

  if (input.durationSec < SHORT_AUDIO_THRESHOLD_SEC && available.google) {
    return "google";
  }

  if (available.whisper) return "whisper";
  if (available.google) return "google";
  return null;
}

export function otherEngine(engine: SttEngine): SttEngine {
  return engine === "whisper" ? "google" : "whisper";
}
