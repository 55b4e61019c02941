import { ConversionParams } from "../entities/conversion-task";
import { EngineType, QualityPreset, isQualityPreset } from "../enums/engine.type";
import { parseBooleanParam, parseFloatParam, parseIntParam, parseOptionalFloatParam, parseStringParam } from "./request.params";

export const DitherModes = ["bayer", "sierra2_4a", "floyd_steinberg", "none"] as const;
export type DitherMode = typeof DitherModes[number];

export interface VideoGifOptions {
  width: number;
  fps: number;
  startTime: number;
  endTime?: number;
  quality: QualityPreset;
  speed: number;
  grayscale: boolean;
  reverse: boolean;
  boomerang: boolean;
  highQuality: boolean;
  dither: DitherMode;
  keepOriginalSize: boolean;
}

export const ConvertibleSourceTypes = ["video", "image", "audio", "document"] as const;
export type ConvertibleSourceType = typeof ConvertibleSourceTypes[number];

export function isConvertibleSourceType(value: unknown): value is ConvertibleSourceType {
  return typeof value === "string" && ConvertibleSourceTypes.some((type) => type === value);
}

/** Conversions the submit endpoint accepts, by source media type. Archives are not submitted here. */
export const SUPPORTED_CONVERSIONS: Record<ConvertibleSourceType, readonly string[]> = {
  video: ["gif", "mp4", "webm", "avi"],
  image: ["jpg", "png", "webp"],
  audio: ["mp3", "wav", "flac", "ogg"],
  document: ["pdf", "docx", "txt", "html"],
};

// Seconds of processing per megabyte of input
const PROCESSING_RATES: Record<string, number> = {
  "video:gif": 2.0,
  "video:mp4": 0.5,
  "image:jpg": 0.1,
  "image:png": 0.2,
  "image:webp": 0.15,
  "audio:mp3": 0.3,
  "document:pdf": 0.2,
};

export function isConversionSupported(source: EngineType, target: string): boolean {
  return isConvertibleSourceType(source) && SUPPORTED_CONVERSIONS[source].includes(target.toLowerCase());
}

export function estimateProcessingTime(source: EngineType, target: string, sizeBytes: number): number {
  const sizeMb = sizeBytes / (1024 * 1024);
  const rate = PROCESSING_RATES[`${source}:${target.toLowerCase()}`] ?? 1.0;
  return Math.max(5, Math.floor(sizeMb * rate));
}

function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined) {
      return source[key];
    }
  }
  return undefined;
}

export function parseQuality(value: unknown, defaultValue: QualityPreset = "medium"): QualityPreset {
  return isQualityPreset(value) ? value : defaultValue;
}

/**
 * Reads video-to-GIF options from request fields or stored params.
 * Both snake_case (wire) and camelCase keys are accepted.
 */
export function parseVideoGifOptions(source: Record<string, unknown>): VideoGifOptions {
  const quality = parseQuality(pick(source, "quality"));
  const ditherValue = parseStringParam(pick(source, "dither"), "bayer");
  const dither = DitherModes.find((mode) => mode === ditherValue) ?? "bayer";

  return {
    width: parseIntParam(pick(source, "width"), 480),
    fps: parseIntParam(pick(source, "fps"), 15),
    startTime: parseFloatParam(pick(source, "start_time", "startTime"), 0),
    endTime: parseOptionalFloatParam(pick(source, "end_time", "endTime")),
    quality,
    speed: parseFloatParam(pick(source, "speed"), 1.0),
    grayscale: parseBooleanParam(pick(source, "grayscale"), false),
    reverse: parseBooleanParam(pick(source, "reverse"), false),
    boomerang: parseBooleanParam(pick(source, "boomerang"), false),
    highQuality: parseBooleanParam(pick(source, "high_quality", "highQuality"), quality === "high"),
    dither,
    keepOriginalSize: parseBooleanParam(pick(source, "keep_original_size", "keepOriginalSize"), false),
  };
}

export function videoGifOptionsToParams(options: VideoGifOptions): ConversionParams {
  const params: ConversionParams = {
    width: options.width,
    fps: options.fps,
    start_time: options.startTime,
    quality: options.quality,
    speed: options.speed,
    grayscale: options.grayscale,
    reverse: options.reverse,
    boomerang: options.boomerang,
    high_quality: options.highQuality,
    dither: options.dither,
    keep_original_size: options.keepOriginalSize,
  };
  if (options.endTime !== undefined) {
    params.end_time = options.endTime;
  }
  return params;
}

/** Params stored on a task for the given target format. */
export function buildConversionParams(targetFormat: string, source: Record<string, unknown>): ConversionParams {
  if (targetFormat === "gif") {
    return videoGifOptionsToParams(parseVideoGifOptions(source));
  }
  return { quality: parseQuality(pick(source, "quality")) };
}

/** Returns human-readable problems with the params; empty when valid. */
export function validateConversionParameters(
  source: EngineType | undefined,
  targetFormat: string,
  params: ConversionParams
): string[] {
  const errors: string[] = [];
  if (targetFormat !== "gif" || (source !== undefined && source !== "video")) {
    return errors;
  }

  const options = parseVideoGifOptions(params);
  if (!options.keepOriginalSize && (options.width < 144 || options.width > 1920)) {
    errors.push("Width must be between 144 and 1920");
  }
  if (options.fps < 5 || options.fps > 30) {
    errors.push("FPS must be between 5 and 30");
  }
  if (options.startTime < 0) {
    errors.push("Start time must not be negative");
  }
  if (options.endTime !== undefined && options.endTime <= options.startTime) {
    errors.push("End time must be greater than start time");
  }
  if (options.speed <= 0) {
    errors.push("Speed must be positive");
  }
  return errors;
}
