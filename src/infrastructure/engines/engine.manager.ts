import { basename } from "path";
import { EngineType, EngineTypes } from "../../domain/enums/engine.type";
import {
  EngineConversionRequest,
  EngineConversionResult,
  EngineDependency,
  IConversionEngine,
} from "../../domain/interfaces/iconversion.engine";
import extensionMap from "./extension-map.json";

const COMPOUND_ARCHIVE_EXTENSIONS = ["tar.gz", "tar.bz2", "tar.xz"];

export interface SupportedFormats {
  input: string[];
  output: string[];
}

export interface EngineStatus {
  available: boolean;
  dependencies: Record<string, boolean>;
  supportedFormats: SupportedFormats;
}

export interface ManagedConversionRequest extends EngineConversionRequest {
  /** Name used for type detection; defaults to the input path. */
  filename?: string;
  engineType?: EngineType;
}

export interface ManagedConversionResult extends EngineConversionResult {
  engineType: EngineType;
}

/** Lower-cased extension, keeping `tar.gz` style archive suffixes whole. */
export function fileExtension(filename: string): string {
  const lower = basename(filename).toLowerCase();
  const compound = COMPOUND_ARCHIVE_EXTENSIONS.find((ext) => lower.endsWith(`.${ext}`));
  if (compound) {
    return compound;
  }
  const dot = lower.lastIndexOf(".");
  return dot < 0 ? "" : lower.slice(dot + 1);
}

export function extensionsForType(type: EngineType): readonly string[] {
  return extensionMap[type];
}

export function detectEngineType(filename: string): EngineType | null {
  const extension = fileExtension(filename);
  if (!extension) {
    return null;
  }
  if (COMPOUND_ARCHIVE_EXTENSIONS.includes(extension)) {
    return "archive";
  }
  // Order matters: "ogg" and "gif" resolve to video
  return EngineTypes.find((type) => extensionMap[type].includes(extension)) ?? null;
}

/**
 * Single entry point to the conversion engines. Picks the engine by file
 * type and refuses to start when one of its required tools is missing.
 */
export class EngineManager {
  private engines = new Map<EngineType, IConversionEngine>();

  constructor(engines: IConversionEngine[]) {
    for (const engine of engines) {
      this.engines.set(engine.type, engine);
    }
  }

  getEngine(type: EngineType): IConversionEngine | undefined {
    return this.engines.get(type);
  }

  detectEngineType(filename: string): EngineType | null {
    return detectEngineType(filename);
  }

  async convertFile(request: ManagedConversionRequest): Promise<ManagedConversionResult> {
    const name = request.filename ?? request.inputPath;
    const engineType = request.engineType ?? this.detectEngineType(name);
    if (!engineType) {
      throw new Error(`Unsupported file type: ${basename(name)}`);
    }

    const engine = this.engines.get(engineType);
    if (!engine) {
      throw new Error(`No ${engineType} engine is registered`);
    }

    const missing = (await engine.getDependencies()).filter((dependency) => !dependency.optional && !dependency.available);
    if (missing.length > 0) {
      throw new Error(`${engineType} engine is unavailable, missing: ${missing.map((dependency) => dependency.name).join(", ")}`);
    }

    if (!engine.supportsOutput(request.outputFormat)) {
      throw new Error(`${engineType} engine does not support output format ${request.outputFormat}`);
    }

    const result = await engine.convert({
      inputPath: request.inputPath,
      outputPath: request.outputPath,
      outputFormat: request.outputFormat,
      params: request.params,
      signal: request.signal,
      onProgress: request.onProgress,
    });
    return { ...result, engineType };
  }

  getSupportedFormats(type?: EngineType): Partial<Record<EngineType, SupportedFormats>> {
    const formats: Partial<Record<EngineType, SupportedFormats>> = {};
    for (const [engineType, engine] of this.engines) {
      if (type && type !== engineType) {
        continue;
      }
      formats[engineType] = { input: [...engine.inputFormats], output: [...engine.outputFormats] };
    }
    return formats;
  }

  async getEngineStatus(): Promise<Partial<Record<EngineType, EngineStatus>>> {
    const status: Partial<Record<EngineType, EngineStatus>> = {};
    for (const [engineType, engine] of this.engines) {
      let dependencies: EngineDependency[] = [];
      try {
        dependencies = await engine.getDependencies();
      } catch (error: unknown) {
        console.warn(`[EngineManager] Dependency check failed for ${engineType}:`, error);
      }
      status[engineType] = {
        available: dependencies.length > 0 && dependencies.every((dependency) => dependency.optional || dependency.available),
        dependencies: Object.fromEntries(dependencies.map((dependency) => [dependency.name, dependency.available])),
        supportedFormats: { input: [...engine.inputFormats], output: [...engine.outputFormats] },
      };
    }
    return status;
  }
}
