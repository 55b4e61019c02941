import { randomUUID } from "crypto";
import { mkdir, mkdtemp, rm, stat, writeFile } from "fs/promises";
import { dirname, join, relative, sep, isAbsolute } from "path";
import { TaskInputFile } from "../../domain/entities/conversion-task";
import { safeFilename } from "../../domain/utils/file.naming";

export const MediaAreas = ["temp", "uploads", "outputs", "results"] as const;
export type MediaArea = typeof MediaAreas[number];

/**
 * Layout of the media root. Everything under it is served at /media.
 */
export class MediaStorage {
  constructor(readonly root: string) {}

  dir(area: MediaArea): string {
    return join(this.root, area);
  }

  pathFor(area: MediaArea, filename: string): string {
    return join(this.dir(area), filename);
  }

  async ensureDirectories(): Promise<void> {
    for (const area of MediaAreas) {
      await mkdir(this.dir(area), { recursive: true });
    }
  }

  /** Public URL of a file under the media root. */
  urlFor(path: string): string {
    const rel = relative(this.root, path);
    if (!rel || rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(`Path is outside the media root: ${path}`);
    }
    return `/media/${rel.split(sep).join("/")}`;
  }

  /** Path behind a /media URL, or null when the URL points outside the media root. */
  pathFromUrl(url: string): string | null {
    if (!url.startsWith("/media/")) {
      return null;
    }
    const path = join(this.root, ...url.slice("/media/".length).split("/"));
    const rel = relative(this.root, path);
    return !rel || rel.startsWith("..") || isAbsolute(rel) ? null : path;
  }

  async saveUpload(buffer: Buffer, originalName: string): Promise<TaskInputFile> {
    await mkdir(this.dir("uploads"), { recursive: true });
    const path = this.pathFor("uploads", `${randomUUID()}-${safeFilename(originalName)}`);
    await writeFile(path, buffer);
    return { path, originalName, size: buffer.length };
  }

  async createWorkDir(prefix: string): Promise<string> {
    await mkdir(this.dir("temp"), { recursive: true });
    return mkdtemp(join(this.dir("temp"), `${prefix}-`));
  }

  /** True for a directory made by createWorkDir, i.e. a direct child of temp/. */
  isWorkDir(path: string): boolean {
    return dirname(path) === this.dir("temp");
  }

  async fileSize(path: string): Promise<number | null> {
    try {
      const info = await stat(path);
      return info.isFile() ? info.size : null;
    } catch {
      return null;
    }
  }

  async exists(path: string): Promise<boolean> {
    return (await this.fileSize(path)) !== null;
  }

  /** Removes a file or directory; failures are logged, not thrown. */
  async remove(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error: unknown) {
      console.warn(`[MediaStorage] Failed to remove ${path}:`, error);
    }
  }
}
