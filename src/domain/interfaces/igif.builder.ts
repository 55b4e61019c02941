import { FrameSize, GifColorCount } from "../utils/gif.frames";

export interface GifAssemblyOptions {
  frameDurationSec: number;
  loop: boolean;
  colors: GifColorCount;
  optimize: boolean;
  signal?: AbortSignal;
}

export interface IGifBuilder {
  readFrameSize(imagePath: string): Promise<FrameSize>;
  /** Writes an RGB PNG frame of exactly `size`. */
  prepareFrame(imagePath: string, outputPath: string, size: FrameSize): Promise<void>;
  assemble(framePaths: string[], outputPath: string, options: GifAssemblyOptions): Promise<void>;
}
