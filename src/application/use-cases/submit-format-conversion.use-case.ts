import { ConversionParams, ConversionTask } from "../../domain/entities/conversion-task";
import { ValidationError } from "../../domain/errors/app.error";
import {
  buildConversionParams,
  estimateProcessingTime,
  isConversionSupported,
  isConvertibleSourceType,
  validateConversionParameters,
} from "../../domain/utils/conversion.rules";
import { parseStringParam } from "../../domain/utils/request.params";
import { detectEngineType } from "../../infrastructure/engines/engine.manager";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { CreateConversionTaskUseCase } from "./create-conversion-task.use-case";
import { UploadedFile } from "./submit-conversion.use-case";

export interface SubmitFormatConversionParams {
  file?: UploadedFile;
  sourceFormat: unknown;
  targetFormat: unknown;
  params: unknown; // JSON text or an object
  createdBy?: string;
}

export interface SubmitFormatConversionResult {
  task: ConversionTask;
  estimatedTimeSec: number;
}

export function parseParamsField(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null || value === "") {
    return {};
  }
  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch {
      throw new ValidationError("params must be valid JSON");
    }
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError("params must be a JSON object");
  }
  return { ...parsed };
}

/** Generic format conversion checked against the supported conversion matrix. */
export class SubmitFormatConversionUseCase {
  constructor(
    private storage: MediaStorage,
    private createTask: CreateConversionTaskUseCase
  ) {}

  async execute(params: SubmitFormatConversionParams): Promise<SubmitFormatConversionResult> {
    const { file } = params;
    if (!file) {
      throw new ValidationError("A file is required");
    }

    const sourceFormat = parseStringParam(params.sourceFormat, "").toLowerCase();
    const targetFormat = parseStringParam(params.targetFormat, "").toLowerCase();
    if (!isConvertibleSourceType(sourceFormat)) {
      throw new ValidationError("source_format must be one of video, image, audio, document");
    }
    if (!targetFormat) {
      throw new ValidationError("target_format is required");
    }

    const detected = detectEngineType(file.originalName);
    if (detected !== sourceFormat) {
      throw new ValidationError(`File type does not match source_format ${sourceFormat}`);
    }
    if (!isConversionSupported(sourceFormat, targetFormat)) {
      throw new ValidationError(`Conversion from ${sourceFormat} to ${targetFormat} is not supported`);
    }

    const conversionParams: ConversionParams = buildConversionParams(targetFormat, parseParamsField(params.params));
    const problems = validateConversionParameters(sourceFormat, targetFormat, conversionParams);
    if (problems.length > 0) {
      throw new ValidationError(problems.join("; "));
    }

    const input = await this.storage.saveUpload(file.buffer, file.originalName);
    const task = await this.createTask.execute({
      kind: "conversion",
      sourceType: "upload",
      originalFilename: file.originalName,
      fileSize: file.size,
      contentType: file.mimeType,
      inputFiles: [input],
      targetFormat,
      conversionParams,
      metadata: { source_format: sourceFormat },
      createdBy: params.createdBy,
    });

    return { task, estimatedTimeSec: estimateProcessingTime(sourceFormat, targetFormat, file.size) };
  }
}
