import { EngineType } from "../../domain/enums/engine.type";
import { ValidationError } from "../../domain/errors/app.error";
import { isConvertibleSourceType } from "../../domain/utils/conversion.rules";
import { EngineManager, EngineStatus, fileExtension } from "../../infrastructure/engines/engine.manager";
import { UploadedFile } from "./submit-conversion.use-case";

export interface DetectedFile {
  name: string;
  size: number;
  contentType: string | null;
  detectedType: EngineType | null;
  extension: string;
  /** True when /api/convert takes this type and its engine can run. */
  supported: boolean;
  engine: EngineStatus | null;
}

/** Classifies an upload without storing it. */
export class DetectFileTypeUseCase {
  constructor(private engineManager: EngineManager) {}

  async execute(file: UploadedFile | undefined): Promise<DetectedFile> {
    if (!file) {
      throw new ValidationError("A file upload is required");
    }

    const detectedType = this.engineManager.detectEngineType(file.originalName);
    const engine = detectedType ? (await this.engineManager.getEngineStatus())[detectedType] ?? null : null;

    return {
      name: file.originalName,
      size: file.size,
      contentType: file.mimeType ?? null,
      detectedType,
      extension: fileExtension(file.originalName),
      supported: isConvertibleSourceType(detectedType) && engine !== null && engine.available,
      engine,
    };
  }
}
