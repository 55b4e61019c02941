import { createWriteStream } from "fs";
import { mkdir, rm } from "fs/promises";
import { join, posix } from "path";
import { Readable, Transform, TransformCallback } from "stream";
import { pipeline } from "stream/promises";
import { DownloadedFile, IFileDownloader } from "../../domain/interfaces/ifile.downloader";
import { safeFilename } from "../../domain/utils/file.naming";

const FALLBACK_FILENAME = "downloaded_file";

// Same ceiling as a direct upload
export const MAX_DOWNLOAD_BYTES = 500 * 1024 * 1024;

/** Base name of the URL path, or a fixed name when the path has none. */
export function filenameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return FALLBACK_FILENAME;
  }
  return decodeSegment(posix.basename(pathname)).trim() || FALLBACK_FILENAME;
}

// Malformed percent-encoding keeps the raw segment
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function tooLarge(maxBytes: number): Error {
  return new Error(`Downloaded file exceeds the limit of ${maxBytes} bytes`);
}

/** Passes chunks through, failing the stream once more than `maxBytes` went by. */
class ByteLimit extends Transform {
  bytes = 0;

  constructor(private maxBytes: number) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.bytes > this.maxBytes) {
      callback(tooLarge(this.maxBytes));
      return;
    }
    callback(null, chunk);
  }
}

export class HttpFileDownloader implements IFileDownloader {
  constructor(
    private fetchImpl: typeof fetch = fetch,
    private maxBytes: number = MAX_DOWNLOAD_BYTES
  ) {}

  async download(url: string, targetDir: string, signal?: AbortSignal): Promise<DownloadedFile> {
    console.log(`[FileDownloader] Downloading ${url}`);
    const response = await this.fetchImpl(url, { signal, redirect: "follow" });
    if (!response.ok) {
      throw new Error(`Failed to download file: HTTP ${response.status}`);
    }

    const declaredLength = Number(response.headers.get("content-length"));
    if (Number.isFinite(declaredLength) && declaredLength > this.maxBytes) {
      await response.body?.cancel();
      throw tooLarge(this.maxBytes);
    }

    const filename = filenameFromUrl(url);
    await mkdir(targetDir, { recursive: true });
    const path = join(targetDir, safeFilename(filename));

    const limit = new ByteLimit(this.maxBytes);
    const source = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
    try {
      await pipeline(source, limit, createWriteStream(path), { signal });
    } catch (error: unknown) {
      await rm(path, { force: true });
      throw error;
    }

    const contentType = response.headers.get("content-type") ?? undefined;
    console.log(`[FileDownloader] Saved ${filename} (${limit.bytes} bytes)`);
    return { path, filename, size: limit.bytes, contentType };
  }
}
