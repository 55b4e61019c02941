import { ConversionTask } from "../../domain/entities/conversion-task";
import { PayloadTooLargeError, ValidationError } from "../../domain/errors/app.error";
import { extensionOf } from "../../domain/utils/file.naming";
import { isSupportedSpeechLanguage } from "../../domain/utils/language.validator";
import {
  AUDIO_UPLOAD_EXTENSIONS,
  AUDIO_UPLOAD_MAX_BYTES,
  audioTranscriptionOptionsToParams,
  parseAudioTranscriptionOptions,
} from "../../domain/utils/transcription.options";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { CreateConversionTaskUseCase } from "./create-conversion-task.use-case";
import { UploadedFile } from "./submit-conversion.use-case";

export interface SubmitAudioTranscriptionParams {
  file?: UploadedFile;
  fields: Record<string, unknown>;
  createdBy?: string;
}

export class SubmitAudioTranscriptionUseCase {
  constructor(
    private storage: MediaStorage,
    private createTask: CreateConversionTaskUseCase
  ) {}

  async execute(params: SubmitAudioTranscriptionParams): Promise<ConversionTask> {
    const { file, fields } = params;
    if (!file) {
      throw new ValidationError("An audio_file upload is required");
    }

    const extension = extensionOf(file.originalName);
    if (!AUDIO_UPLOAD_EXTENSIONS.some((allowed) => allowed === extension)) {
      throw new ValidationError(`Unsupported audio format. Allowed: ${AUDIO_UPLOAD_EXTENSIONS.join(", ")}`);
    }
    if (file.size > AUDIO_UPLOAD_MAX_BYTES) {
      throw new PayloadTooLargeError("Audio file exceeds the 200 MB limit");
    }
    if (fields.language !== undefined && fields.language !== "" && !isSupportedSpeechLanguage(fields.language)) {
      throw new ValidationError(`Unsupported language: ${String(fields.language)}`);
    }

    const options = parseAudioTranscriptionOptions(fields);
    const input = await this.storage.saveUpload(file.buffer, file.originalName);

    return this.createTask.execute({
      kind: "audio_to_text",
      sourceType: "upload",
      originalFilename: file.originalName,
      fileSize: file.size,
      contentType: file.mimeType,
      inputFiles: [input],
      targetFormat: options.outputFormat,
      conversionParams: audioTranscriptionOptionsToParams(options),
      metadata: {},
      createdBy: params.createdBy,
    });
  }
}
