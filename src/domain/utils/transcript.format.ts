import { SegmentTranscription } from "../entities/transcription";

export function formatSrtTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  const millis = Math.floor((seconds % 1) * 1000);
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(millis, 3)}`;
}

export function buildSrt(results: SegmentTranscription[]): string {
  if (results.length === 0) {
    return "";
  }

  const lines: string[] = [];
  let cue = 1;
  for (const result of results) {
    const text = result.text.trim();
    if (!text) {
      continue;
    }
    lines.push(String(cue));
    lines.push(`${formatSrtTime(result.start)} --> ${formatSrtTime(result.end)}`);
    lines.push(text);
    lines.push("");
    cue++;
  }
  return lines.join("\n");
}

/**
 * Joins segment texts into the final transcription: trimmed, empty
 * segments dropped, whitespace runs collapsed to a single space.
 */
export function assembleTranscript(results: SegmentTranscription[]): string {
  return results
    .map((result) => result.text.trim())
    .filter((text) => text.length > 0)
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Local time as YYYYMMDD_HHMMSS, used in generated file names. */
export function formatFileTimestamp(date: Date): string {
  const datePart = `${date.getFullYear()}${pad(date.getMonth() + 1, 2)}${pad(date.getDate(), 2)}`;
  const timePart = `${pad(date.getHours(), 2)}${pad(date.getMinutes(), 2)}${pad(date.getSeconds(), 2)}`;
  return `${datePart}_${timePart}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
