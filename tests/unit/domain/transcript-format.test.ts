import { SegmentTranscription } from "../../../src/domain/entities/transcription";
import { assembleTranscript, buildSrt, formatSrtTime } from "../../../src/domain/utils/transcript.format";
import { computeSpeechRanges } from "../../../src/domain/utils/speech.ranges";

function segment(text: string, start: number, end: number): SegmentTranscription {
  return { text, start, end, language: "en-US", confidence: 0.9 };
}

describe("transcript formatting", () => {
  it("formats SRT timestamps", () => {
    expect(formatSrtTime(0)).toBe("00:00:00,000");
    expect(formatSrtTime(3661.5)).toBe("01:01:01,500");
  });

  it("numbers cues and skips empty segments", () => {
    const srt = buildSrt([segment(" hi ", 0, 1.5), segment(" ", 1.5, 2), segment("there", 2, 3.25)]);
    expect(srt).toBe("1\n00:00:00,000 --> 00:00:01,500\nhi\n\n2\n00:00:02,000 --> 00:00:03,250\nthere\n");
    expect(buildSrt([])).toBe("");
  });

  it("joins segment texts with collapsed whitespace", () => {
    expect(assembleTranscript([segment("  hello   world ", 0, 1), segment("", 1, 2), segment("again", 2, 3)])).toBe(
      "hello world again"
    );
  });
});

describe("computeSpeechRanges", () => {
  it("pads speech ranges without crossing the middle of a silence", () => {
    const ranges = computeSpeechRanges(
      [
        { startSec: 7, endSec: 9 },
        { startSec: 2, endSec: 4 },
      ],
      10
    );
    expect(ranges).toEqual([
      { startSec: 0, endSec: 2.5 },
      { startSec: 3.5, endSec: 7.5 },
      { startSec: 8.5, endSec: 10 },
    ]);
  });

  it("returns nothing when the whole file is silent", () => {
    expect(computeSpeechRanges([{ startSec: 0, endSec: 10 }], 10)).toEqual([]);
  });

  it("drops ranges shorter than the minimum", () => {
    const ranges = computeSpeechRanges([{ startSec: 0.2, endSec: 10 }], 10, { keepSilenceSec: 0, minRangeSec: 0.5 });
    expect(ranges).toEqual([]);
  });
});
