import {
  buildConversionParams,
  estimateProcessingTime,
  isConversionSupported,
  validateConversionParameters,
} from "../../../src/domain/utils/conversion.rules";
import { canTransition, durationSeconds, progressTransition, sourcesFor } from "../../../src/domain/utils/conversion-task.state";
import { selectSttEngine } from "../../../src/domain/utils/stt-engine.selector";
import { toGoogleLanguage, toWhisperLanguage } from "../../../src/domain/utils/language.validator";

const MB = 1024 * 1024;

describe("conversion rules", () => {
  it("checks the conversion matrix", () => {
    expect(isConversionSupported("video", "GIF")).toBe(true);
    expect(isConversionSupported("image", "gif")).toBe(false);
    expect(isConversionSupported("document", "html")).toBe(true);
  });

  it("keeps archives out of the conversion matrix", () => {
    expect(isConversionSupported("archive", "zip")).toBe(false);
    expect(isConversionSupported("archive", "tar.gz")).toBe(false);
  });

  it("estimates processing time from the input size", () => {
    expect(estimateProcessingTime("video", "gif", 10 * MB)).toBe(20);
    expect(estimateProcessingTime("image", "jpg", MB)).toBe(5);
    expect(estimateProcessingTime("archive", "zip", 50 * MB)).toBe(50);
  });

  it("reports every invalid GIF parameter", () => {
    const errors = validateConversionParameters("video", "gif", {
      width: 100,
      fps: 40,
      start_time: 5,
      end_time: 3,
      speed: 0,
    });
    expect(errors).toEqual([
      "Width must be between 144 and 1920",
      "FPS must be between 5 and 30",
      "End time must be greater than start time",
      "Speed must be positive",
    ]);
  });

  it("skips the width check when the original size is kept", () => {
    expect(validateConversionParameters("video", "gif", { width: 100, keep_original_size: true })).toEqual([]);
    expect(validateConversionParameters("image", "gif", { width: 1 })).toEqual([]);
  });

  it("stores full GIF params and only quality otherwise", () => {
    expect(buildConversionParams("mp4", { quality: "high", width: 300 })).toEqual({ quality: "high" });
    expect(buildConversionParams("gif", { width: "320", grayscale: "yes" })).toEqual({
      width: 320,
      fps: 15,
      start_time: 0,
      quality: "medium",
      speed: 1,
      grayscale: true,
      reverse: false,
      boomerang: false,
      high_quality: false,
      dither: "bayer",
      keep_original_size: false,
    });
  });
});

describe("task state", () => {
  it("never leaves a finished status", () => {
    expect(canTransition("done", "running")).toBe(false);
    expect(canTransition("failed", "done")).toBe(false);
    expect(canTransition("running", "running")).toBe(true);
    expect(sourcesFor("failed")).toEqual(["queued", "running"]);
  });

  it("rejects out-of-range progress", () => {
    expect(progressTransition(101)).toBeNull();
    expect(progressTransition(Number.NaN)).toBeNull();
    expect(progressTransition(42.7)).toEqual({ from: ["queued", "running"], updates: { progress: 42 } });
  });

  it("measures duration from start to completion", () => {
    const startedAt = new Date("2024-03-01T10:00:00Z");
    expect(durationSeconds({ startedAt, completedAt: new Date("2024-03-01T10:00:30Z") })).toBe(30);
    expect(durationSeconds({})).toBeNull();
  });
});

describe("speech engine selection", () => {
  const both = { whisper: true, google: true };

  it("prefers whisper when asked", () => {
    expect(selectSttEngine({ durationSec: 10, useWhisper: true, preferredEngine: "google", available: both })).toBe("whisper");
    expect(
      selectSttEngine({ durationSec: 10, useWhisper: true, preferredEngine: "whisper", available: { whisper: false, google: true } })
    ).toBe("google");
    expect(
      selectSttEngine({ durationSec: 10, useWhisper: true, preferredEngine: "whisper", available: { whisper: false, google: false } })
    ).toBeNull();
  });

  it("uses the preferred engine, then google for short clips", () => {
    expect(selectSttEngine({ durationSec: 300, useWhisper: false, preferredEngine: "google", available: both })).toBe("google");
    expect(
      selectSttEngine({ durationSec: 60, useWhisper: false, preferredEngine: "whisper", available: { whisper: false, google: true } })
    ).toBe("google");
    expect(
      selectSttEngine({ durationSec: 300, useWhisper: false, preferredEngine: "google", available: { whisper: true, google: false } })
    ).toBe("whisper");
  });

  it("maps languages per engine", () => {
    expect(toWhisperLanguage("en-GB")).toBe("en");
    expect(toWhisperLanguage("zh-CN")).toBe("zh");
    expect(toWhisperLanguage("auto")).toBeUndefined();
    expect(toGoogleLanguage("auto")).toBe("ru-RU");
    expect(toGoogleLanguage("de-DE")).toBe("de-DE");
  });
});
