import { ConversionParams, JsonObject } from "../entities/conversion-task";
import { EngineType } from "../enums/engine.type";

export interface EngineDependency {
  name: string;
  available: boolean;
  /** Needed only for some formats; the engine stays usable without it. */
  optional?: boolean;
}

export interface EngineConversionRequest {
  inputPath: string;
  outputPath: string;
  outputFormat: string;
  params: ConversionParams;
  signal?: AbortSignal;
  onProgress?: (progress: number) => void;
}

export interface EngineConversionResult {
  outputPath: string;
  info: JsonObject;
}

export interface IConversionEngine {
  readonly type: EngineType;
  readonly inputFormats: readonly string[];
  readonly outputFormats: readonly string[];
  getDependencies(): Promise<EngineDependency[]>;
  isAvailable(): Promise<boolean>;
  supportsOutput(format: string): boolean;
  convert(request: EngineConversionRequest): Promise<EngineConversionResult>;
}
