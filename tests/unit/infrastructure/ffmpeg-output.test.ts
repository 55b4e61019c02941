import { parseSilenceDetect, parseVolumeDetect } from "../../../src/infrastructure/audio/ffmpeg.output.parser";
import { buildConcatList, buildPaletteFilter } from "../../../src/infrastructure/image/gif-builder.service";

describe("ffmpeg output parsing", () => {
  it("reads volumedetect levels", () => {
    const stderr = [
      "[Parsed_volumedetect_0 @ 0x55d1] n_samples: 441000",
      "[Parsed_volumedetect_0 @ 0x55d1] mean_volume: -23.5 dB",
      "[Parsed_volumedetect_0 @ 0x55d1] max_volume: -4.0 dB",
    ].join("\n");
    expect(parseVolumeDetect(stderr)).toEqual({ meanDb: -23.5, maxDb: -4 });
  });

  it("treats silent input as minus infinity", () => {
    const stats = parseVolumeDetect("mean_volume: -inf dB\nmax_volume: -inf dB");
    expect(stats.meanDb).toBe(-Infinity);
    expect(stats.maxDb).toBe(-Infinity);
  });

  it("fails when a level is missing", () => {
    expect(() => parseVolumeDetect("max_volume: -1.0 dB")).toThrow("ffmpeg volumedetect output is missing mean_volume");
  });

  it("pairs silence starts and ends, closing an open one at the duration", () => {
    const stderr = [
      "[silencedetect @ 0x1] silence_start: -0.01",
      "[silencedetect @ 0x1] silence_end: 0.8 | silence_duration: 0.81",
      "[silencedetect @ 0x1] silence_start: 1.5",
      "[silencedetect @ 0x1] silence_end: 3.2 | silence_duration: 1.7",
      "[silencedetect @ 0x1] silence_start: 8.4",
    ].join("\n");
    expect(parseSilenceDetect(stderr, 10)).toEqual([
      { startSec: 0, endSec: 0.8 },
      { startSec: 1.5, endSec: 3.2 },
      { startSec: 8.4, endSec: 10 },
    ]);
  });
});

describe("GIF assembly inputs", () => {
  it("writes a concat list with the last frame repeated", () => {
    expect(buildConcatList(["/t/a.png", "/t/it's.png"], 0.5)).toBe(
      "file '/t/a.png'\nduration 0.5\nfile '/t/it'\\''s.png'\nduration 0.5\nfile '/t/it'\\''s.png'\n"
    );
  });

  it("builds the palette filter", () => {
    expect(buildPaletteFilter(64, true)).toBe(
      "split[s0][s1];[s0]palettegen=max_colors=64:stats_mode=diff[p];[s1][p]paletteuse=diff_mode=rectangle"
    );
    expect(buildPaletteFilter(128, false)).toBe("split[s0][s1];[s0]palettegen=max_colors=128[p];[s1][p]paletteuse");
  });
});
