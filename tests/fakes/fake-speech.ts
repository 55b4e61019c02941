import { writeFile } from "fs/promises";
import { SttEngine } from "../../src/domain/enums/stt.engine";
import {
  IAudioProcessor,
  SilenceDetectionOptions,
  SpeechPreparationOptions,
  VolumeStats,
} from "../../src/domain/interfaces/iaudio.processor";
import {
  ITranscriptionProvider,
  SpeechTranscription,
  TranscriptionOptions,
} from "../../src/domain/interfaces/itranscription.provider";
import { TimeRange } from "../../src/domain/utils/speech.ranges";

type Reply = SpeechTranscription | Error;

/** Answers each call with the next queued reply, repeating the last one. */
export class FakeTranscriptionProvider implements ITranscriptionProvider {
  readonly calls: Array<{ path: string; options: TranscriptionOptions }> = [];

  constructor(
    readonly engine: SttEngine,
    private replies: Reply[] = [{ text: "hello" }],
    private available = true
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  async transcribeFile(audioPath: string, options: TranscriptionOptions): Promise<SpeechTranscription> {
    this.calls.push({ path: audioPath, options });
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

/** Writes placeholder files where ffmpeg would write audio. */
export class FakeAudioProcessor implements IAudioProcessor {
  readonly extracted: Array<{ input: string; output: string; range: TimeRange }> = [];
  readonly prepared: Array<{ input: string; output: string; options: SpeechPreparationOptions }> = [];
  silenceOptions: SilenceDetectionOptions | null = null;

  constructor(
    public durationSec = 10,
    public silences: TimeRange[] = [],
    public volume: VolumeStats = { meanDb: -20, maxDb: -3 }
  ) {}

  async probeDuration(): Promise<number> {
    return this.durationSec;
  }

  async measureVolume(): Promise<VolumeStats> {
    return this.volume;
  }

  async prepareForSpeech(inputPath: string, outputPath: string, options: SpeechPreparationOptions): Promise<void> {
    this.prepared.push({ input: inputPath, output: outputPath, options });
    await writeFile(outputPath, "prepared");
  }

  async detectSilences(_path: string, options: SilenceDetectionOptions): Promise<TimeRange[]> {
    this.silenceOptions = options;
    return this.silences;
  }

  async extractSegment(inputPath: string, outputPath: string, range: TimeRange): Promise<void> {
    this.extracted.push({ input: inputPath, output: outputPath, range });
    await writeFile(outputPath, "segment");
  }
}
