import { ConversionTask, TaskInputFile } from "../../domain/entities/conversion-task";
import { PayloadTooLargeError, ValidationError } from "../../domain/errors/app.error";
import { extensionOf } from "../../domain/utils/file.naming";
import {
  GIF_IMAGE_EXTENSIONS,
  GIF_MAX_IMAGES,
  GIF_MAX_IMAGE_BYTES,
  GIF_MAX_TOTAL_BYTES,
  GIF_MIN_IMAGES,
  imagesToGifOptionsToParams,
  parseImagesToGifOptions,
  validateImagesToGifOptions,
} from "../../domain/utils/gif.frames";
import { MediaStorage } from "../../infrastructure/storage/media.storage";
import { CreateConversionTaskUseCase } from "./create-conversion-task.use-case";
import { UploadedFile } from "./submit-conversion.use-case";

export interface SubmitImagesToGifParams {
  files: UploadedFile[];
  fields: Record<string, unknown>;
  createdBy?: string;
}

export function validateGifUploads(files: UploadedFile[]): void {
  if (files.length < GIF_MIN_IMAGES) {
    throw new ValidationError(`At least ${GIF_MIN_IMAGES} images are required`);
  }
  if (files.length > GIF_MAX_IMAGES) {
    throw new ValidationError(`At most ${GIF_MAX_IMAGES} images are allowed`);
  }

  let total = 0;
  for (const file of files) {
    const extension = extensionOf(file.originalName);
    if (!GIF_IMAGE_EXTENSIONS.some((allowed) => allowed === extension)) {
      throw new ValidationError(`Unsupported image format: ${file.originalName}`);
    }
    if (file.size > GIF_MAX_IMAGE_BYTES) {
      throw new PayloadTooLargeError(`Image ${file.originalName} exceeds the 10 MB limit`);
    }
    total += file.size;
  }
  if (total > GIF_MAX_TOTAL_BYTES) {
    throw new PayloadTooLargeError("Images exceed the 100 MB total limit");
  }
}

export class SubmitImagesToGifUseCase {
  constructor(
    private storage: MediaStorage,
    private createTask: CreateConversionTaskUseCase
  ) {}

  async execute(params: SubmitImagesToGifParams): Promise<ConversionTask> {
    validateGifUploads(params.files);

    const options = parseImagesToGifOptions(params.fields);
    const problems = validateImagesToGifOptions(options);
    if (problems.length > 0) {
      throw new ValidationError(problems.join("; "));
    }

    const inputFiles: TaskInputFile[] = [];
    for (const file of params.files) {
      inputFiles.push(await this.storage.saveUpload(file.buffer, file.originalName));
    }
    const totalSize = params.files.reduce((sum, file) => sum + file.size, 0);

    return this.createTask.execute({
      kind: "images_to_gif",
      sourceType: "upload",
      originalFilename: params.files[0].originalName,
      fileSize: totalSize,
      inputFiles,
      targetFormat: "gif",
      conversionParams: imagesToGifOptionsToParams(options),
      metadata: { images_count: params.files.length },
      createdBy: params.createdBy,
    });
  }
}
