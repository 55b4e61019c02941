import { DetectedFile } from "../../application/use-cases/detect-file-type.use-case";
import { EngineStatus } from "../../infrastructure/engines/engine.manager";

export interface EngineStatusResponse {
  available: boolean;
  dependencies: Record<string, boolean>;
  supported_formats: { input: string[]; output: string[] };
}

export function toEngineStatusResponse(status: EngineStatus): EngineStatusResponse {
  return {
    available: status.available,
    dependencies: status.dependencies,
    supported_formats: status.supportedFormats,
  };
}

export function toDetectedFileResponse(detected: DetectedFile) {
  return {
    success: true,
    file_info: {
      name: detected.name,
      size: detected.size,
      content_type: detected.contentType,
      detected_type: detected.detectedType,
      extension: detected.extension,
    },
    supported: detected.supported,
    engine: detected.engine ? toEngineStatusResponse(detected.engine) : null,
  };
}
