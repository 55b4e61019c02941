import { readFile, readdir } from "fs/promises";
import { AudioProcessingPipeline } from "../../../src/application/pipeline/audio.processing.pipeline";
import { SpeechRecognitionService } from "../../../src/application/services/speech-recognition.service";
import { TaskProgressService } from "../../../src/application/services/task-progress.service";
import { GenerateOutputsStep } from "../../../src/application/steps/generate.outputs.step";
import { LoadAudioStep } from "../../../src/application/steps/load.audio.step";
import { PreprocessAudioStep } from "../../../src/application/steps/preprocess.audio.step";
import { SegmentAudioStep } from "../../../src/application/steps/segment.audio.step";
import { TranscriptionStep, segmentProgress } from "../../../src/application/steps/transcription.step";
import { ProcessAudioTranscriptionUseCase } from "../../../src/application/use-cases/process-audio-transcription.use-case";
import { TaskInputFile } from "../../../src/domain/entities/conversion-task";
import { MediaStorage } from "../../../src/infrastructure/storage/media.storage";
import { FakeAudioProcessor, FakeTranscriptionProvider } from "../../fakes/fake-speech";
import { InMemoryHistoryRepository } from "../../fakes/in-memory-history.repository";
import { InMemoryTaskRepository } from "../../fakes/in-memory-task.repository";
import { buildTask, createTempStorage, jobContext } from "../../fakes/test-context";

describe("segmentProgress", () => {
  it("spreads segment completion over 40-80", () => {
    expect(segmentProgress(1, 3)).toBe(53);
    expect(segmentProgress(2, 3)).toBe(66);
    expect(segmentProgress(3, 3)).toBe(80);
  });
});

describe("ProcessAudioTranscriptionUseCase", () => {
  let storage: MediaStorage;
  let cleanup: () => Promise<void>;
  let tasks: InMemoryTaskRepository;
  let processor: FakeAudioProcessor;
  let whisper: FakeTranscriptionProvider;
  let useCase: ProcessAudioTranscriptionUseCase;
  let input: TaskInputFile;

  beforeEach(async () => {
    ({ storage, cleanup } = await createTempStorage());
    tasks = new InMemoryTaskRepository();
    processor = new FakeAudioProcessor(10, [
      { startSec: 2, endSec: 4 },
      { startSec: 7, endSec: 9 },
    ]);
    whisper = new FakeTranscriptionProvider("whisper", [{ text: "one" }, { text: "two" }, { text: "three" }]);
    const speech = new SpeechRecognitionService([whisper], processor, "whisper");
    const pipeline = new AudioProcessingPipeline([
      new LoadAudioStep(processor, 3600),
      new PreprocessAudioStep(processor),
      new SegmentAudioStep(processor),
      new TranscriptionStep(speech),
      new GenerateOutputsStep(storage),
    ]);
    useCase = new ProcessAudioTranscriptionUseCase(
      tasks,
      new TaskProgressService(tasks, new InMemoryHistoryRepository()),
      pipeline,
      storage
    );
    input = await storage.saveUpload(Buffer.from("RIFF"), "talk.wav");
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanup();
  });

  function seedAudioTask(params: Record<string, string | boolean>): void {
    tasks.seed(
      buildTask({
        kind: "audio_to_text",
        originalFilename: "talk.wav",
        targetFormat: "txt",
        inputFiles: [input],
        conversionParams: params,
      })
    );
  }

  it("splits on silence, transcribes every range and stores the outputs", async () => {
    seedAudioTask({ language: "en-US", output_format: "srt", remove_silence: true });
    const update = jest.spyOn(tasks, "updateIfStatus");

    await useCase.execute({ taskId: "task-a", context: jobContext() });

    const task = tasks.tasks.get("task-a");
    expect(task?.status).toBe("done");
    expect(task?.metadata).toMatchObject({
      transcription: "one two three",
      duration: 10,
      language: "en-US",
      segments_count: 3,
      engine_used: "whisper",
      fallback_segments: 0,
    });
    expect(processor.silenceOptions).toMatchObject({ minSilenceSec: 1, thresholdDb: -60 });
    expect(processor.extracted.map((entry) => entry.range)).toEqual([
      { startSec: 0, endSec: 2.5 },
      { startSec: 3.5, endSec: 7.5 },
      { startSec: 8.5, endSec: 10 },
    ]);

    expect(task?.outputPath?.endsWith(".srt")).toBe(true);
    const srt = await readFile(task?.outputPath ?? "", "utf8");
    expect(srt).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\none\n\n" +
        "2\n00:00:03,500 --> 00:00:07,500\ntwo\n\n" +
        "3\n00:00:08,500 --> 00:00:10,000\nthree\n"
    );

    const progress = update.mock.calls.map(([, , updates]) => updates.progress).filter((value) => value !== undefined);
    expect(progress).toEqual([5, 15, 25, 40, 53, 66, 80, 85, 100]);

    // Only the transcript files stay behind; the scratch directory is gone
    const left = (await readdir(storage.dir("temp"))).map((name) => name.slice(name.lastIndexOf("."))).sort();
    expect(left).toEqual([".json", ".srt", ".txt"]);
    expect(await storage.exists(input.path)).toBe(false);
  });

  it("links all three transcript files from the metadata", async () => {
    seedAudioTask({ language: "en-US" });

    await useCase.execute({ taskId: "task-a", context: jobContext() });

    const task = tasks.tasks.get("task-a");
    const files = task?.metadata.output_files;
    expect(files).toEqual({
      txt_url: expect.stringMatching(/^\/media\/temp\/transcription_task-a_\d{8}_\d{6}\.txt$/),
      srt_url: expect.stringMatching(/\.srt$/),
      json_url: expect.stringMatching(/\.json$/),
    });
    expect(await readFile(task?.outputPath ?? "", "utf8")).toBe("one");
    expect(whisper.calls).toHaveLength(1);
    expect(processor.prepared[0].options.enhanceSpeech).toBe(true);
  });

  it("fails the task when the audio is longer than allowed", async () => {
    processor.durationSec = 4000;
    seedAudioTask({});

    await expect(useCase.execute({ taskId: "task-a", context: jobContext() })).rejects.toThrow(
      "Audio is too long: 4000s (maximum 3600s)"
    );

    const task = tasks.tasks.get("task-a");
    expect(task?.status).toBe("failed");
    expect(task?.errorMessage).toBe("Audio is too long: 4000s (maximum 3600s)");
    expect(await readdir(storage.dir("temp"))).toEqual([]);
  });

  it("leaves the task running when a retry will follow", async () => {
    whisper = new FakeTranscriptionProvider("whisper", [{ text: "" }]);
    const speech = new SpeechRecognitionService([whisper], processor, "whisper");
    useCase = new ProcessAudioTranscriptionUseCase(
      tasks,
      new TaskProgressService(tasks, new InMemoryHistoryRepository()),
      new AudioProcessingPipeline([
        new LoadAudioStep(processor, 3600),
        new PreprocessAudioStep(processor),
        new SegmentAudioStep(processor),
        new TranscriptionStep(speech),
      ]),
      storage
    );
    seedAudioTask({});

    await expect(
      useCase.execute({ taskId: "task-a", context: jobContext({ isFinalAttempt: false }) })
    ).rejects.toThrow("No speech was recognized in the audio");

    expect(tasks.tasks.get("task-a")?.status).toBe("running");
    expect(await storage.exists(input.path)).toBe(true);
  });
});
