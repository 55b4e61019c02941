import { ConversionTask, JsonObject, TaskInputFile } from "../../domain/entities/conversion-task";
import { ValidationError } from "../../domain/errors/app.error";
import { buildConversionParams, validateConversionParameters } from "../../domain/utils/conversion.rules";
import { parseStringParam } from "../../domain/utils/request.params";
import { detectEngineType } from "../../infrastructure/engines/engine.manager";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { CreateConversionTaskUseCase } from "./create-conversion-task.use-case";

export interface UploadedFile {
  buffer: Buffer;
  originalName: string;
  mimeType?: string;
  size: number;
}

export interface SubmitConversionParams {
  file?: UploadedFile;
  url?: string;
  fields: Record<string, unknown>;
  createdBy?: string;
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/** Conversion from an uploaded file or a URL; the target defaults to GIF. */
export class SubmitConversionUseCase {
  constructor(
    private storage: MediaStorage,
    private createTask: CreateConversionTaskUseCase
  ) {}

  async execute(params: SubmitConversionParams): Promise<ConversionTask> {
    const { file, fields } = params;
    const url = params.url?.trim();
    if (!file && !url) {
      throw new ValidationError("Either a file or a url is required");
    }
    if (!file && url && !isHttpUrl(url)) {
      throw new ValidationError("URL must use http or https");
    }

    const targetFormat = parseStringParam(fields.target_format, "gif").toLowerCase();
    const conversionParams = buildConversionParams(targetFormat, fields);
    const sourceType = file ? detectEngineType(file.originalName) ?? undefined : undefined;
    const problems = validateConversionParameters(sourceType, targetFormat, conversionParams);
    if (problems.length > 0) {
      throw new ValidationError(problems.join("; "));
    }

    const metadata: JsonObject = {};
    let inputFiles: TaskInputFile[] = [];
    if (file) {
      inputFiles = [await this.storage.saveUpload(file.buffer, file.originalName)];
    }

    return this.createTask.execute({
      kind: "conversion",
      sourceType: file ? "upload" : "url",
      sourceUrl: file ? undefined : url,
      originalFilename: file?.originalName,
      fileSize: file?.size,
      contentType: file?.mimeType,
      inputFiles,
      targetFormat,
      conversionParams,
      metadata,
      createdBy: params.createdBy,
    });
  }
}
