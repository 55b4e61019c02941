import { basename, extname } from "path";
import { formatFileTimestamp } from "./transcript.format";

const CONTENT_TYPES: Record<string, string> = {
  ".gif": "image/gif",
  ".mp4": "video/mp4",
  ".avi": "video/avi",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".txt": "text/plain; charset=utf-8",
};

export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

/** Base name without its last extension. */
export function fileStem(filename: string): string {
  const name = basename(filename);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export function extensionOf(filename: string): string {
  return extname(filename).replace(/^\./, "").toLowerCase();
}

export function downloadFilename(originalFilename: string | undefined, targetFormat: string): string {
  const stem = originalFilename ? fileStem(originalFilename) : "result";
  return `${stem}_converted.${targetFormat}`;
}

/**
 * Archive entry name for a task's result. Names already taken get a
 * `_1`, `_2`... suffix before the extension.
 */
export function batchEntryName(
  taskId: string,
  originalFilename: string | undefined,
  targetFormat: string,
  taken: ReadonlySet<string>
): string {
  const stem = fileStem(originalFilename ?? "converted");
  let name = `task_${taskId}_${stem}.${targetFormat}`;
  let counter = 1;
  while (taken.has(name)) {
    name = `task_${taskId}_${stem}_${counter}.${targetFormat}`;
    counter++;
  }
  return name;
}

export function batchArchiveName(now: Date): string {
  return `conversion_results_${formatFileTimestamp(now)}.zip`;
}

/** Strips directory parts and characters that are unsafe in file names. */
export function safeFilename(name: string, fallback = "file"): string {
  const cleaned = basename(name.replace(/\\/g, "/"))
    .replace(/[^\w.\-]+/g, "_")
    .replace(/^\.+/, "");
  return cleaned || fallback;
}
