export interface TimeRange {
  startSec: number;
  endSec: number;
}

export interface SpeechRangeOptions {
  keepSilenceSec: number; // Silence kept around each speech range
  minRangeSec: number; // Ranges shorter than this are dropped
}

export const DEFAULT_SPEECH_RANGE_OPTIONS: SpeechRangeOptions = {
  keepSilenceSec: 0.5,
  minRangeSec: 0.5,
};

/**
 * Turns detected silences into padded speech ranges.
 * Padding that would overlap a neighbour is split at the midpoint of the
 * silence between them. Returns an empty list when nothing usable is left.
 */
export function computeSpeechRanges(
  silences: TimeRange[],
  durationSec: number,
  options: SpeechRangeOptions = DEFAULT_SPEECH_RANGE_OPTIONS
): TimeRange[] {
  const sorted = [...silences]
    .map((s) => ({ startSec: Math.max(0, s.startSec), endSec: Math.min(durationSec, s.endSec) }))
    .filter((s) => s.endSec > s.startSec)
    .sort((a, b) => a.startSec - b.startSec);

  const speech: TimeRange[] = [];
  let cursor = 0;
  for (const silence of sorted) {
    if (silence.startSec > cursor) {
      speech.push({ startSec: cursor, endSec: silence.startSec });
    }
    cursor = Math.max(cursor, silence.endSec);
  }
  if (cursor < durationSec) {
    speech.push({ startSec: cursor, endSec: durationSec });
  }

  const padded = speech.map((range, index) => {
    const previous = speech[index - 1];
    const next = speech[index + 1];
    const lowerBound = previous ? (previous.endSec + range.startSec) / 2 : 0;
    const upperBound = next ? (range.endSec + next.startSec) / 2 : durationSec;
    return {
      startSec: round3(Math.max(lowerBound, range.startSec - options.keepSilenceSec)),
      endSec: round3(Math.min(upperBound, range.endSec + options.keepSilenceSec)),
    };
  });

  return padded.filter((range) => range.endSec - range.startSec >= options.minRangeSec);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
