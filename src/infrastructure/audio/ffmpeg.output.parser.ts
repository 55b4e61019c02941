import { VolumeStats } from "../../domain/interfaces/iaudio.processor";
import { TimeRange } from "../../domain/utils/speech.ranges";

function parseDb(stderr: string, key: string): number {
  const match = stderr.match(new RegExp(`${key}:\\s*(-?inf|-?\\d+(?:\\.\\d+)?) dB`));
  if (!match) {
    throw new Error(`ffmpeg volumedetect output is missing ${key}`);
  }
  return match[1].endsWith("inf") ? -Infinity : parseFloat(match[1]);
}

/** Reads mean and peak levels from the `volumedetect` filter report. */
export function parseVolumeDetect(stderr: string): VolumeStats {
  return {
    meanDb: parseDb(stderr, "mean_volume"),
    maxDb: parseDb(stderr, "max_volume"),
  };
}

/**
 * Collects `silencedetect` intervals. A silence still open at the end of
 * the stream closes at `durationSec`.
 */
export function parseSilenceDetect(stderr: string, durationSec: number): TimeRange[] {
  const silences: TimeRange[] = [];
  let openStart: number | null = null;

  for (const line of stderr.split("\n")) {
    const start = line.match(/silence_start:\s*(-?\d+(?:\.\d+)?)/);
    if (start) {
      openStart = Math.max(0, parseFloat(start[1]));
      continue;
    }
    const end = line.match(/silence_end:\s*(-?\d+(?:\.\d+)?)/);
    if (end && openStart !== null) {
      silences.push({ startSec: openStart, endSec: parseFloat(end[1]) });
      openStart = null;
    }
  }

  if (openStart !== null && openStart < durationSec) {
    silences.push({ startSec: openStart, endSec: durationSec });
  }
  return silences;
}
