import { rm } from "fs/promises";
import { EngineDependency, EngineConversionRequest, EngineConversionResult } from "../../domain/interfaces/iconversion.engine";
import { parseQuality, parseVideoGifOptions, VideoGifOptions } from "../../domain/utils/conversion.rules";
import { FfmpegRunner } from "../ffmpeg/ffmpeg.runner";
import { BaseEngine } from "./base.engine";
import {
  buildPaletteGraph,
  buildPaletteUseGraph,
  buildSinglePassGraph,
  buildTranscodeArgs,
  buildTrimArgs,
} from "./video.filters";

export function validateTrimRange(options: Pick<VideoGifOptions, "startTime" | "endTime">, durationSec: number): void {
  if (options.startTime >= durationSec) {
    throw new Error(`Start time ${options.startTime}s is beyond the video duration (${durationSec.toFixed(2)}s)`);
  }
  if (options.endTime !== undefined && options.endTime > durationSec) {
    throw new Error(`End time ${options.endTime}s is beyond the video duration (${durationSec.toFixed(2)}s)`);
  }
}

export class VideoEngine extends BaseEngine {
  readonly type = "video";
  readonly inputFormats = ["mp4", "avi", "mov", "mkv", "webm", "flv", "m4v", "wmv", "mpg", "mpeg", "3gp", "ogg", "ogv", "gif"];
  readonly outputFormats = ["gif", "mp4", "webm", "avi"];

  constructor(private ffmpeg: FfmpegRunner) {
    super();
  }

  async getDependencies(): Promise<EngineDependency[]> {
    return [
      { name: "ffmpeg", available: await this.ffmpeg.isAvailable() },
      { name: "ffprobe", available: await this.ffmpeg.isProbeAvailable() },
    ];
  }

  protected async run(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const duration = await this.ffmpeg.probeDuration(request.inputPath, request.signal);
    const { width, height } = await this.ffmpeg.probeDimensions(request.inputPath, request.signal);
    this.report(request, 10);

    if (request.outputFormat === "gif") {
      return this.toGif(request, duration, { width, height });
    }

    const quality = parseQuality(request.params.quality);
    await this.ffmpeg.run(
      ["-i", request.inputPath, ...buildTranscodeArgs(request.outputFormat, quality), request.outputPath],
      request.signal
    );
    this.report(request, 100);

    return {
      outputPath: request.outputPath,
      info: { input_duration: duration, input_width: width, input_height: height, quality },
    };
  }

  private async toGif(
    request: EngineConversionRequest,
    duration: number,
    source: { width: number; height: number }
  ): Promise<EngineConversionResult> {
    const options = parseVideoGifOptions(request.params);
    validateTrimRange(options, duration);
    const trim = buildTrimArgs(options);

    if (options.highQuality) {
      const palettePath = `${request.outputPath}.palette.png`;
      try {
        await this.ffmpeg.run(
          [...trim, "-i", request.inputPath, "-filter_complex", buildPaletteGraph(options), palettePath],
          request.signal
        );
        this.report(request, 50);
        await this.ffmpeg.run(
          [
            ...trim,
            "-i",
            request.inputPath,
            "-i",
            palettePath,
            "-filter_complex",
            buildPaletteUseGraph(options),
            "-loop",
            "0",
            request.outputPath,
          ],
          request.signal
        );
      } finally {
        await rm(palettePath, { force: true });
      }
    } else {
      await this.ffmpeg.run(
        [...trim, "-i", request.inputPath, "-filter_complex", buildSinglePassGraph(options), "-loop", "0", request.outputPath],
        request.signal
      );
    }
    this.report(request, 100);

    return {
      outputPath: request.outputPath,
      info: {
        input_duration: duration,
        input_width: source.width,
        input_height: source.height,
        palette_mode: options.highQuality ? "two_pass" : "single_pass",
      },
    };
  }
}
