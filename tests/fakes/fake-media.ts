import { copyFile, writeFile } from "fs/promises";
import { join } from "path";
import { EngineType } from "../../src/domain/enums/engine.type";
import {
  EngineConversionRequest,
  EngineConversionResult,
  EngineDependency,
  IConversionEngine,
} from "../../src/domain/interfaces/iconversion.engine";
import { DownloadedFile, IFileDownloader } from "../../src/domain/interfaces/ifile.downloader";
import { GifAssemblyOptions, IGifBuilder } from "../../src/domain/interfaces/igif.builder";
import { FrameSize } from "../../src/domain/utils/gif.frames";

/** Copies the input to the output and reports progress 50 then 100. */
export class FakeEngine implements IConversionEngine {
  readonly requests: EngineConversionRequest[] = [];
  failure: Error | null = null;

  constructor(
    readonly type: EngineType,
    readonly inputFormats: readonly string[],
    readonly outputFormats: readonly string[],
    private dependencies: EngineDependency[] = []
  ) {}

  async getDependencies(): Promise<EngineDependency[]> {
    return this.dependencies;
  }

  async isAvailable(): Promise<boolean> {
    return this.dependencies.every((dependency) => dependency.optional || dependency.available);
  }

  supportsOutput(format: string): boolean {
    return this.outputFormats.includes(format.toLowerCase());
  }

  async convert(request: EngineConversionRequest): Promise<EngineConversionResult> {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    request.onProgress?.(50);
    await copyFile(request.inputPath, request.outputPath);
    request.onProgress?.(100);
    return { outputPath: request.outputPath, info: { engine: this.type } };
  }
}

export class FakeGifBuilder implements IGifBuilder {
  readonly prepared: Array<{ input: string; output: string; size: FrameSize }> = [];
  assembled: { frames: string[]; output: string; options: GifAssemblyOptions } | null = null;
  /** Path suffixes that fail to decode. */
  unreadable: string[] = [];

  constructor(private sizes: Record<string, FrameSize> = {}, private fallbackSize: FrameSize = { width: 800, height: 600 }) {}

  async readFrameSize(imagePath: string): Promise<FrameSize> {
    this.assertReadable(imagePath);
    const match = Object.entries(this.sizes).find(([suffix]) => imagePath.endsWith(suffix));
    return match ? match[1] : this.fallbackSize;
  }

  async prepareFrame(imagePath: string, outputPath: string, size: FrameSize): Promise<void> {
    this.assertReadable(imagePath);
    this.prepared.push({ input: imagePath, output: outputPath, size });
    await writeFile(outputPath, "frame");
  }

  async assemble(framePaths: string[], outputPath: string, options: GifAssemblyOptions): Promise<void> {
    this.assembled = { frames: framePaths, output: outputPath, options };
    await writeFile(outputPath, "GIF89a");
  }

  private assertReadable(imagePath: string): void {
    if (this.unreadable.some((suffix) => imagePath.endsWith(suffix))) {
      throw new Error("unsupported image format");
    }
  }
}

export class FakeFileDownloader implements IFileDownloader {
  readonly urls: string[] = [];
  failure: Error | null = null;

  constructor(private filename = "clip.mp4", private content = "downloaded") {}

  async download(url: string, targetDir: string): Promise<DownloadedFile> {
    this.urls.push(url);
    if (this.failure) {
      throw this.failure;
    }
    const path = join(targetDir, this.filename);
    await writeFile(path, this.content);
    return { path, filename: this.filename, size: Buffer.byteLength(this.content) };
  }
}
