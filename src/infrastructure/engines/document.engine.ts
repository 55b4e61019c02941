import { mkdtemp, readdir, rename, rm } from "fs/promises";
import { dirname, join, parse } from "path";
import { pathToFileURL } from "url";
import { EngineDependency, EngineConversionRequest, EngineConversionResult } from "../../domain/interfaces/iconversion.engine";
import { isCommandAvailable, runCommand } from "../system/command.runner";
import { BaseEngine } from "./base.engine";

// LibreOffice filter names where the bare extension is ambiguous
const CONVERT_TARGETS: Record<string, string> = {
  txt: "txt:Text",
  html: "html",
};

/**
 * Office documents through LibreOffice in headless mode. Each run gets its
 * own profile directory so parallel conversions do not share a lock.
 */
export class DocumentEngine extends BaseEngine {
  readonly type = "document";
  readonly inputFormats = ["pdf", "doc", "docx", "rtf", "odt", "txt", "md", "html", "htm", "xls", "xlsx", "ods", "csv", "ppt", "pptx", "odp"];
  readonly outputFormats = ["pdf", "docx", "odt", "rtf", "txt", "html"];

  constructor(private sofficePath: string) {
    super();
  }

  async getDependencies(): Promise<EngineDependency[]> {
    return [{ name: "libreoffice", available: await isCommandAvailable(this.sofficePath, ["--version"]) }];
  }

  protected async run(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const tempDir = await mkdtemp(join(dirname(request.outputPath), ".soffice-"));

    try {
      const target = CONVERT_TARGETS[request.outputFormat] ?? request.outputFormat;
      const args = [
        `-env:UserInstallation=${pathToFileURL(join(tempDir, "profile")).href}`,
        "--headless",
        "--convert-to",
        target,
        request.inputPath,
        "--outdir",
        tempDir,
      ];
      this.report(request, 10);
      await runCommand(this.sofficePath, args, { signal: request.signal });

      const expected = `${parse(request.inputPath).name}.${request.outputFormat}`.toLowerCase();
      const lowerSuffix = `.${request.outputFormat}`;
      const converted = (await readdir(tempDir)).filter((file) => file.toLowerCase().endsWith(lowerSuffix));
      const convertedFile = converted.find((file) => file.toLowerCase() === expected) ?? converted[0];
      if (!convertedFile) {
        throw new Error(`LibreOffice conversion completed without producing a "${request.outputFormat}" output.`);
      }

      await rename(join(tempDir, convertedFile), request.outputPath);
      this.report(request, 100);
      return { outputPath: request.outputPath, info: { converter: "libreoffice", filter: target } };
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}
