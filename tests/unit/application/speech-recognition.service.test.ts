import { join } from "path";
import {
  NoSpeechEngineError,
  SpeechRecognitionService,
} from "../../../src/application/services/speech-recognition.service";
import { AudioSegment } from "../../../src/domain/entities/transcription";
import { parseAudioTranscriptionOptions } from "../../../src/domain/utils/transcription.options";
import { FakeAudioProcessor, FakeTranscriptionProvider } from "../../fakes/fake-speech";
import { createTempStorage } from "../../fakes/test-context";

const segments: AudioSegment[] = [
  { path: "/work/segment_0000.wav", startSec: 0, endSec: 5 },
  { path: "/work/segment_0001.wav", startSec: 5, endSec: 9 },
];

describe("SpeechRecognitionService", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("retries a failed segment with the other engine and counts it", async () => {
    const whisper = new FakeTranscriptionProvider("whisper", [{ text: " first " }, new Error("rate limited")]);
    const google = new FakeTranscriptionProvider("google", [{ text: "second", confidence: 0.7 }]);
    const service = new SpeechRecognitionService([whisper, google], new FakeAudioProcessor(), "whisper");
    const done: Array<[number, number]> = [];

    const result = await service.transcribeSegments({
      segments,
      durationSec: 9,
      options: parseAudioTranscriptionOptions({ language: "en-US" }),
      workDir: "/work",
      onSegmentDone: async (count, total) => {
        done.push([count, total]);
      },
    });

    expect(result.engineUsed).toBe("whisper");
    expect(result.fallbackSegments).toBe(1);
    expect(result.results).toEqual([
      { text: "first", start: 0, end: 5, language: "en-US", confidence: 0.9 },
      { text: "second", start: 5, end: 9, language: "en-US", confidence: 0.7 },
    ]);
    expect(google.calls.map((call) => call.path)).toEqual(["/work/segment_0001.wav"]);
    expect(done).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it("drops segments that come back empty or fail on both engines", async () => {
    const whisper = new FakeTranscriptionProvider("whisper", [{ text: "   " }, new Error("timeout")]);
    const google = new FakeTranscriptionProvider("google", [new Error("quota exceeded")]);
    const service = new SpeechRecognitionService([whisper, google], new FakeAudioProcessor(), "whisper");

    const result = await service.transcribeSegments({
      segments,
      durationSec: 9,
      options: parseAudioTranscriptionOptions({}),
      workDir: "/work",
    });

    expect(result.results).toEqual([]);
    expect(result.fallbackSegments).toBe(0);
  });

  it("keeps the language reported by the engine", async () => {
    const whisper = new FakeTranscriptionProvider("whisper", [{ text: "hola", language: "es" }]);
    const service = new SpeechRecognitionService([whisper], new FakeAudioProcessor(), "whisper");

    const result = await service.transcribeSegments({
      segments: [segments[0]],
      durationSec: 5,
      options: parseAudioTranscriptionOptions({}),
      workDir: "/work",
    });

    expect(result.results[0].language).toBe("es");
  });

  it("cuts long segments down before sending them to Google", async () => {
    const { storage, cleanup } = await createTempStorage();
    try {
      const workDir = await storage.createWorkDir("audio");
      const processor = new FakeAudioProcessor();
      const google = new FakeTranscriptionProvider("google", [{ text: "long speech" }]);
      const whisper = new FakeTranscriptionProvider("whisper", [], false);
      const service = new SpeechRecognitionService([whisper, google], processor, "whisper");

      const result = await service.transcribeSegments({
        segments: [{ path: join(workDir, "prepared.wav"), startSec: 0, endSec: 80 }],
        durationSec: 80,
        options: parseAudioTranscriptionOptions({ language: "ru-RU" }),
        workDir,
      });

      expect(result.engineUsed).toBe("google");
      expect(processor.extracted).toEqual([
        { input: join(workDir, "prepared.wav"), output: join(workDir, "google_segment_0.wav"), range: { startSec: 0, endSec: 50 } },
      ]);
      expect(google.calls[0].path).toBe(join(workDir, "google_segment_0.wav"));
      expect(result.results[0]).toEqual({ text: "long speech", start: 0, end: 80, language: "ru-RU", confidence: 0.9 });
    } finally {
      await cleanup();
    }
  });

  it("throws when no engine is configured", async () => {
    const service = new SpeechRecognitionService(
      [new FakeTranscriptionProvider("whisper", [], false), new FakeTranscriptionProvider("google", [], false)],
      new FakeAudioProcessor(),
      "whisper"
    );

    await expect(
      service.transcribeSegments({ segments, durationSec: 9, options: parseAudioTranscriptionOptions({}), workDir: "/work" })
    ).rejects.toBeInstanceOf(NoSpeechEngineError);
  });

  it("prefers Google for short clips when Whisper is not requested", () => {
    const service = new SpeechRecognitionService(
      [new FakeTranscriptionProvider("whisper", [], false), new FakeTranscriptionProvider("google")],
      new FakeAudioProcessor(),
      "whisper"
    );

    expect(service.selectEngine(30, false)).toBe("google");
    expect(service.availableEngines()).toEqual({ whisper: false, google: true });
  });
});
