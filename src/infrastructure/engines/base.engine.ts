import { EngineType } from "../../domain/enums/engine.type";
import {
  EngineConversionRequest,
  EngineConversionResult,
  EngineDependency,
  IConversionEngine,
} from "../../domain/interfaces/iconversion.engine";

export abstract class BaseEngine implements IConversionEngine {
  abstract readonly type: EngineType;
  abstract readonly inputFormats: readonly string[];
  abstract readonly outputFormats: readonly string[];

  abstract getDependencies(): Promise<EngineDependency[]>;
  protected abstract run(request: EngineConversionRequest): Promise<EngineConversionResult>;

  async isAvailable(): Promise<boolean> {
    const dependencies = await this.getDependencies();
    return dependencies.every((dependency) => dependency.optional || dependency.available);
  }

  supportsOutput(format: string): boolean {
    return this.outputFormats.includes(format.toLowerCase());
  }

  async convert(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const format = request.outputFormat.toLowerCase();
    if (!this.supportsOutput(format)) {
      throw new Error(`${this.type} engine cannot produce ${format} (supported: ${this.outputFormats.join(", ")})`);
    }

    const started = Date.now();
    console.log(`[${this.constructor.name}] Converting ${request.inputPath} to ${format}`);
    const result = await this.run({ ...request, outputFormat: format });
    console.log(`[${this.constructor.name}] Finished in ${((Date.now() - started) / 1000).toFixed(1)}s`);
    return result;
  }

  protected report(request: EngineConversionRequest, progress: number): void {
    request.onProgress?.(Math.max(0, Math.min(100, Math.round(progress))));
  }
}
