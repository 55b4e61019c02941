import sharp from "sharp";
import { QualityPreset } from "../../domain/enums/engine.type";
import { EngineDependency, EngineConversionRequest, EngineConversionResult } from "../../domain/interfaces/iconversion.engine";
import { parseQuality } from "../../domain/utils/conversion.rules";
import { BaseEngine } from "./base.engine";

const QUALITY_VALUES: Record<QualityPreset, number> = {
  high: 95,
  medium: 85,
  low: 70,
};

export class ImageEngine extends BaseEngine {
  readonly type = "image";
  readonly inputFormats = ["jpg", "jpeg", "png", "gif", "tiff", "tif", "webp", "svg", "avif"];
  readonly outputFormats = ["jpg", "jpeg", "png", "webp", "tiff", "gif", "avif"];

  async getDependencies(): Promise<EngineDependency[]> {
    return [{ name: "sharp", available: true }];
  }

  protected async run(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const quality = parseQuality(request.params.quality);
    const value = QUALITY_VALUES[quality];

    const image = sharp(request.inputPath, { failOnError: true, limitInputPixels: Math.pow(2, 28) }).rotate();
    const metadata = await image.metadata();
    this.report(request, 20);

    switch (request.outputFormat) {
      case "jpg":
      case "jpeg":
        // JPEG has no alpha channel
        image.flatten({ background: "#ffffff" }).jpeg({ quality: value, mozjpeg: true });
        break;
      case "png":
        image.png({ quality: value, compressionLevel: 9 });
        break;
      case "webp":
        image.webp({ quality: value });
        break;
      case "tiff":
        image.tiff({ quality: value });
        break;
      case "avif":
        image.avif({ quality: value });
        break;
      default:
        image.gif();
    }

    const output = await image.toFile(request.outputPath);
    this.report(request, 100);

    return {
      outputPath: request.outputPath,
      info: {
        quality,
        input_format: metadata.format ?? "unknown",
        width: output.width,
        height: output.height,
      },
    };
  }
}
