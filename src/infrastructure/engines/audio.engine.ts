import { QualityPreset } from "../../domain/enums/engine.type";
import { EngineDependency, EngineConversionRequest, EngineConversionResult } from "../../domain/interfaces/iconversion.engine";
import { parseQuality } from "../../domain/utils/conversion.rules";
import { FfmpegRunner } from "../ffmpeg/ffmpeg.runner";
import { BaseEngine } from "./base.engine";

const BITRATES: Record<QualityPreset, string> = {
  high: "320k",
  medium: "192k",
  low: "128k",
};

export function buildAudioCodecArgs(format: string, quality: QualityPreset): string[] {
  const bitrate = BITRATES[quality];
  switch (format) {
    case "mp3":
      return ["-c:a", "libmp3lame", "-b:a", bitrate];
    case "wav":
      return ["-c:a", "pcm_s16le"];
    case "flac":
      return ["-c:a", "flac"];
    case "ogg":
      return ["-c:a", "libvorbis", "-b:a", bitrate];
    default:
      // aac and m4a
      return ["-c:a", "aac", "-b:a", bitrate];
  }
}

export class AudioEngine extends BaseEngine {
  readonly type = "audio";
  readonly inputFormats = ["mp3", "wav", "flac", "aac", "m4a", "ogg", "wma", "opus", "amr"];
  readonly outputFormats = ["mp3", "wav", "flac", "ogg", "aac", "m4a"];

  constructor(private ffmpeg: FfmpegRunner) {
    super();
  }

  async getDependencies(): Promise<EngineDependency[]> {
    return [{ name: "ffmpeg", available: await this.ffmpeg.isAvailable() }];
  }

  protected async run(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const quality = parseQuality(request.params.quality);
    this.report(request, 10);
    await this.ffmpeg.run(
      ["-i", request.inputPath, "-vn", ...buildAudioCodecArgs(request.outputFormat, quality), request.outputPath],
      request.signal
    );
    this.report(request, 100);
    return {
      outputPath: request.outputPath,
      info: { quality, bitrate: request.outputFormat === "wav" || request.outputFormat === "flac" ? "lossless" : BITRATES[quality] },
    };
  }
}
