import sharp from "sharp";
import { rm, writeFile } from "fs/promises";
import { FrameSize } from "../../domain/utils/gif.frames";
import { GifAssemblyOptions, IGifBuilder } from "../../domain/interfaces/igif.builder";
import { FfmpegRunner } from "../ffmpeg/ffmpeg.runner";

function quoteConcatPath(path: string): string {
  return `'${path.replace(/'/g, "'\\''")}'`;
}

/**
 * ffmpeg concat list giving every frame the same display time. The last
 * entry is repeated because the demuxer ignores the final duration.
 */
export function buildConcatList(framePaths: string[], frameDurationSec: number): string {
  const lines: string[] = [];
  for (const path of framePaths) {
    lines.push(`file ${quoteConcatPath(path)}`, `duration ${frameDurationSec}`);
  }
  if (framePaths.length > 0) {
    lines.push(`file ${quoteConcatPath(framePaths[framePaths.length - 1])}`);
  }
  return lines.join("\n") + "\n";
}

/** Single-pass palette filter graph for a GIF limited to `colors`. */
export function buildPaletteFilter(colors: number, optimize: boolean): string {
  const statsMode = optimize ? ":stats_mode=diff" : "";
  const diffMode = optimize ? "=diff_mode=rectangle" : "";
  return `split[s0][s1];[s0]palettegen=max_colors=${colors}${statsMode}[p];[s1][p]paletteuse${diffMode}`;
}

export class GifBuilderService implements IGifBuilder {
  constructor(private ffmpeg: FfmpegRunner) {}

  async readFrameSize(imagePath: string): Promise<FrameSize> {
    const { width, height } = await sharp(imagePath).metadata();
    if (!width || !height) {
      throw new Error(`Could not read image size of ${imagePath}`);
    }
    return { width, height };
  }

  async prepareFrame(imagePath: string, outputPath: string, size: FrameSize): Promise<void> {
    await sharp(imagePath)
      .rotate()
      .resize(size.width, size.height, { fit: "fill", kernel: "lanczos3" })
      .flatten({ background: "#ffffff" })
      .png()
      .toFile(outputPath);
  }

  async assemble(framePaths: string[], outputPath: string, options: GifAssemblyOptions): Promise<void> {
    await this.ffmpeg.ensureAvailable();

    const listPath = `${outputPath}.frames.txt`;
    await writeFile(listPath, buildConcatList(framePaths, options.frameDurationSec));
    console.log(`[GifBuilder] Assembling ${framePaths.length} frames into ${outputPath}`);

    try {
      await this.ffmpeg.run(
        [
          "-f",
          "concat",
          "-safe",
          "0",
          "-i",
          listPath,
          "-filter_complex",
          buildPaletteFilter(options.colors, options.optimize),
          "-loop",
          options.loop ? "0" : "-1",
          outputPath,
        ],
        options.signal
      );
    } finally {
      await rm(listPath, { force: true });
    }
  }
}
