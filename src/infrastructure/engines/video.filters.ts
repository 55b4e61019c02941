import { DitherMode, VideoGifOptions } from "../../domain/utils/conversion.rules";
import { QualityPreset } from "../../domain/enums/engine.type";

export interface EncoderPreset {
  crf: number;
  preset: string;
}

export const ENCODER_PRESETS: Record<QualityPreset, EncoderPreset> = {
  high: { crf: 18, preset: "slow" },
  medium: { crf: 23, preset: "medium" },
  low: { crf: 28, preset: "fast" },
};

/** Seek and trim arguments placed before `-i`. */
export function buildTrimArgs(options: Pick<VideoGifOptions, "startTime" | "endTime">): string[] {
  const args: string[] = [];
  if (options.startTime > 0) {
    args.push("-ss", String(options.startTime));
  }
  if (options.endTime !== undefined) {
    args.push("-t", String(options.endTime - options.startTime));
  }
  return args;
}

/**
 * Filter graph reading `[0:v]` and producing `[v]`: speed, fps, scale,
 * colour, then direction.
 */
export function buildGifFilterGraph(options: VideoGifOptions): string {
  const filters: string[] = [];
  if (options.speed !== 1) {
    filters.push(`setpts=PTS/${options.speed}`);
  }
  filters.push(`fps=${options.fps}`);
  if (!options.keepOriginalSize) {
    filters.push(`scale=${options.width}:-2:flags=lanczos`);
  }
  if (options.grayscale) {
    filters.push("hue=s=0");
  }
  if (options.reverse && !options.boomerang) {
    filters.push("reverse");
  }

  const chain = filters.join(",");
  if (options.boomerang) {
    return `[0:v]${chain},split[fw][bw];[bw]reverse[rv];[fw][rv]concat=n=2:v=1:a=0[v]`;
  }
  return `[0:v]${chain}[v]`;
}

function ditherOption(dither: DitherMode): string {
  return dither === "bayer" ? "dither=bayer:bayer_scale=3" : `dither=${dither}`;
}

export function buildSinglePassGraph(options: VideoGifOptions): string {
  return `${buildGifFilterGraph(options)};[v]split[s0][s1];[s0]palettegen[p];[s1][p]paletteuse=${ditherOption(options.dither)}`;
}

export function buildPaletteGraph(options: VideoGifOptions): string {
  return `${buildGifFilterGraph(options)};[v]palettegen=stats_mode=diff`;
}

/** Second pass: palette is input 1. */
export function buildPaletteUseGraph(options: VideoGifOptions): string {
  return `${buildGifFilterGraph(options)};[v][1:v]paletteuse=${ditherOption(options.dither)}`;
}

export function buildTranscodeArgs(format: string, quality: QualityPreset): string[] {
  const { crf, preset } = ENCODER_PRESETS[quality];
  switch (format) {
    case "webm":
      return ["-c:v", "libvpx-vp9", "-crf", String(crf + 10), "-b:v", "0", "-c:a", "libopus"];
    case "avi":
      return ["-c:v", "libx264", "-crf", String(crf), "-preset", preset, "-c:a", "libmp3lame"];
    default:
      return ["-c:v", "libx264", "-crf", String(crf), "-preset", preset, "-pix_fmt", "yuv420p", "-c:a", "aac", "-movflags", "+faststart"];
  }
}
