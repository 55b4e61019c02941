import { writeFile } from "fs/promises";
import { assembleTranscript, buildSrt, formatFileTimestamp } from "../../domain/utils/transcript.format";
import { AudioProcessingContext } from "../pipeline/audio.processing.context";
import { IAudioProcessingStep } from "../pipeline/audio.processing.step";
import { MediaStorage } from "../../infrastructure/storage/media.storage";

export class GenerateOutputsStep implements IAudioProcessingStep {
  constructor(private storage: MediaStorage) {}

  async execute(context: AudioProcessingContext): Promise<AudioProcessingContext> {
    const { transcription, durationSec } = context;
    if (!transcription || durationSec === undefined) {
      throw new Error("GenerateOutputsStep needs a transcription");
    }

    await context.reportProgress(85);
    const now = new Date();
    const text = assembleTranscript(transcription.results);
    const baseName = `transcription_${context.task.id}_${formatFileTimestamp(now)}`;

    const txtPath = this.storage.pathFor("temp", `${baseName}.txt`);
    const srtPath = this.storage.pathFor("temp", `${baseName}.srt`);
    const jsonPath = this.storage.pathFor("temp", `${baseName}.json`);

    const document = {
      text,
      duration: durationSec,
      timestamp: now.toISOString(),
      segments: transcription.results,
      segments_count: transcription.results.length,
      language: transcription.results[0]?.language ?? "unknown",
    };

    await writeFile(txtPath, text, "utf8");
    await writeFile(srtPath, buildSrt(transcription.results), "utf8");
    await writeFile(jsonPath, JSON.stringify(document, null, 2), "utf8");

    return {
      ...context,
      text,
      outputFiles: {
        txtPath,
        srtPath,
        jsonPath,
        txtUrl: this.storage.urlFor(txtPath),
        srtUrl: this.storage.urlFor(srtPath),
        jsonUrl: this.storage.urlFor(jsonPath),
      },
    };
  }
}
