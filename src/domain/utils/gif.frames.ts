import { basename } from "path";
import { ConversionParams } from "../entities/conversion-task";
import { parseBooleanParam, parseFloatParam, parseIntParam } from "./request.params";

export const FrameSortOrders = ["upload", "filename", "reverse"] as const;
export type FrameSortOrder = typeof FrameSortOrders[number];

export const GifOutputSizes = ["original", "320", "480", "640", "800"] as const;
export type GifOutputSize = typeof GifOutputSizes[number];

export const GifColorCounts = [256, 128, 64, 32] as const;
export type GifColorCount = typeof GifColorCounts[number];

export interface FrameSource {
  path: string;
  originalName: string;
}

export interface FrameSize {
  width: number;
  height: number;
}

export function isFrameSortOrder(value: unknown): value is FrameSortOrder {
  return typeof value === "string" && FrameSortOrders.some((order) => order === value);
}

export function isGifOutputSize(value: unknown): value is GifOutputSize {
  return typeof value === "string" && GifOutputSizes.some((size) => size === value);
}

export function isGifColorCount(value: unknown): value is GifColorCount {
  return typeof value === "number" && GifColorCounts.some((count) => count === value);
}

export function sortFrames<T extends FrameSource>(frames: T[], order: FrameSortOrder): T[] {
  if (order === "upload") {
    return [...frames];
  }
  const byName = [...frames].sort((a, b) => {
    const left = basename(a.originalName).toLowerCase();
    const right = basename(b.originalName).toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
  return order === "reverse" ? byName.reverse() : byName;
}

/** Appends the frames backwards (minus the last) so the animation bounces. */
export function applyPingPong<T>(frames: T[]): T[] {
  return [...frames, ...frames.slice(0, -1).reverse()];
}

/**
 * Target frame size from the first image. Dimensions are kept even so the
 * encoder never has to pad.
 */
export function calculateOutputSize(source: FrameSize, option: GifOutputSize): FrameSize {
  if (option === "original") {
    return { width: source.width, height: source.height };
  }

  let width = parseInt(option, 10);
  let height = Math.floor((width * source.height) / source.width);
  if (width % 2 !== 0) width -= 1;
  if (height % 2 !== 0) height -= 1;
  return { width, height };
}

export const GIF_IMAGE_EXTENSIONS = ["jpg", "jpeg", "png", "webp", "tiff"] as const;
export const GIF_MIN_IMAGES = 2;
export const GIF_MAX_IMAGES = 100;
export const GIF_MAX_IMAGE_BYTES = 10 * 1024 * 1024;
export const GIF_MAX_TOTAL_BYTES = 100 * 1024 * 1024;

export interface ImagesToGifOptions {
  frameDurationSec: number;
  loop: boolean;
  pingpong: boolean;
  sortOrder: FrameSortOrder;
  outputSize: GifOutputSize;
  colors: GifColorCount;
  optimize: boolean;
}

export function parseImagesToGifOptions(source: Record<string, unknown>): ImagesToGifOptions {
  const sortOrder = source.sort_order;
  const outputSize = typeof source.output_size === "number" ? String(source.output_size) : source.output_size;
  const colors = parseIntParam(source.colors, 128);
  return {
    frameDurationSec: parseFloatParam(source.frame_duration, 0.5),
    loop: parseBooleanParam(source.loop, true),
    pingpong: parseBooleanParam(source.pingpong, false),
    sortOrder: isFrameSortOrder(sortOrder) ? sortOrder : "upload",
    outputSize: isGifOutputSize(outputSize) ? outputSize : "480",
    colors: isGifColorCount(colors) ? colors : 128,
    optimize: parseBooleanParam(source.optimize, true),
  };
}

export function validateImagesToGifOptions(options: ImagesToGifOptions): string[] {
  const errors: string[] = [];
  if (options.frameDurationSec < 0.1 || options.frameDurationSec > 5.0) {
    errors.push("Frame duration must be between 0.1 and 5.0 seconds");
  }
  return errors;
}

export function imagesToGifOptionsToParams(options: ImagesToGifOptions): ConversionParams {
  return {
    frame_duration: options.frameDurationSec,
    loop: options.loop,
    pingpong: options.pingpong,
    sort_order: options.sortOrder,
    output_size: options.outputSize,
    colors: options.colors,
    optimize: options.optimize,
  };
}
