import JSZip from "jszip";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "path";
import { EngineDependency, EngineConversionRequest, EngineConversionResult } from "../../domain/interfaces/iconversion.engine";
import { isCommandAvailable, runCommand } from "../system/command.runner";
import { BaseEngine } from "./base.engine";

export interface ArchiveBinaries {
  tar: string;
  sevenZip: string;
}

type ArchiveKind = "zip" | "tar" | "sevenzip";

const TAR_COMPRESSION: Record<string, string | null> = {
  tar: null,
  "tar.gz": "-z",
  tgz: "-z",
  "tar.bz2": "-j",
  tbz2: "-j",
  "tar.xz": "-J",
  txz: "-J",
};

export function archiveFormatOf(path: string): string | null {
  const lower = path.toLowerCase();
  const compound = Object.keys(TAR_COMPRESSION).find((ext) => ext.includes(".") && lower.endsWith(`.${ext}`));
  if (compound) {
    return compound;
  }
  const ext = lower.split(".").pop();
  return ext && ext !== lower ? ext : null;
}

function kindOf(format: string): ArchiveKind | null {
  if (format === "zip") return "zip";
  if (format in TAR_COMPRESSION) return "tar";
  if (format === "7z" || format === "rar") return "sevenzip";
  return null;
}

/** Throws when an entry would land outside the extraction root. */
export function assertInsideRoot(root: string, entryName: string): string {
  const target = resolve(root, entryName);
  const rel = relative(root, target);
  if (isAbsolute(entryName) || rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`Archive entry escapes the extraction directory: ${entryName}`);
  }
  return target;
}

async function listFiles(root: string, prefix = ""): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(join(root, prefix), { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, rel)));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files;
}

/**
 * Repacks archives: the input is extracted into a scratch directory and the
 * tree is packed again in the target format.
 */
export class ArchiveEngine extends BaseEngine {
  readonly type = "archive";
  readonly inputFormats = ["zip", "rar", "7z", "tar", "tar.gz", "tgz", "tar.bz2", "tbz2", "tar.xz", "txz"];
  readonly outputFormats = ["zip", "7z", "tar", "tar.gz", "tar.bz2", "tar.xz"];

  constructor(private binaries: ArchiveBinaries) {
    super();
  }

  async getDependencies(): Promise<EngineDependency[]> {
    return [
      { name: "jszip", available: true },
      { name: "tar", available: await isCommandAvailable(this.binaries.tar, ["--version"]), optional: true },
      { name: "7z", available: await isCommandAvailable(this.binaries.sevenZip, ["i"]), optional: true },
    ];
  }

  protected async run(request: EngineConversionRequest): Promise<EngineConversionResult> {
    const inputFormat = archiveFormatOf(request.inputPath);
    const inputKind = inputFormat ? kindOf(inputFormat) : null;
    if (!inputFormat || !inputKind) {
      throw new Error(`Unsupported archive input: ${request.inputPath}`);
    }

    const workDir = await mkdtemp(join(dirname(request.outputPath), ".archive-"));
    const root = join(workDir, "content");
    await mkdir(root);

    try {
      await this.extract(inputKind, request.inputPath, root, request.signal);
      const files = await listFiles(root);
      this.report(request, 50);

      await this.pack(request.outputFormat, root, request.outputPath, files, request.signal);
      this.report(request, 100);

      return {
        outputPath: request.outputPath,
        info: { input_format: inputFormat, files_count: files.length },
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async extract(kind: ArchiveKind, input: string, root: string, signal?: AbortSignal): Promise<void> {
    if (kind === "zip") {
      await this.extractZip(input, root);
      return;
    }
    if (kind === "tar") {
      const { stdout } = await runCommand(this.binaries.tar, ["-tf", input], { signal });
      stdout.split("\n").filter(Boolean).forEach((name) => assertInsideRoot(root, name));
      await runCommand(this.binaries.tar, ["-xf", input, "-C", root], { signal });
      return;
    }

    const { stdout } = await runCommand(this.binaries.sevenZip, ["l", "-slt", input], { signal });
    for (const line of stdout.split("\n")) {
      const match = line.match(/^Path = (.+)$/);
      // The first Path entry names the archive itself
      if (match && resolve(match[1].trim()) !== resolve(input)) {
        assertInsideRoot(root, match[1].trim());
      }
    }
    await runCommand(this.binaries.sevenZip, ["x", `-o${root}`, "-y", input], { signal });
  }

  private async extractZip(input: string, root: string): Promise<void> {
    const zip = await JSZip.loadAsync(await readFile(input));
    const entries: JSZip.JSZipObject[] = [];
    zip.forEach((_path, entry) => {
      entries.push(entry);
    });

    for (const entry of entries) {
      const target = assertInsideRoot(root, entry.name);
      if (entry.dir) {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, await entry.async("nodebuffer"));
    }
  }

  private async pack(format: string, root: string, output: string, files: string[], signal?: AbortSignal): Promise<void> {
    const kind = kindOf(format);
    if (kind === "zip") {
      const zip = new JSZip();
      for (const file of files) {
        zip.file(file, await readFile(join(root, ...file.split("/"))));
      }
      const content = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
      await writeFile(output, content);
      return;
    }
    if (kind === "tar") {
      const compression = TAR_COMPRESSION[format];
      const args = compression ? ["-c", compression, "-f", output, "-C", root, "."] : ["-cf", output, "-C", root, "."];
      await runCommand(this.binaries.tar, args, { signal });
      return;
    }
    await runCommand(this.binaries.sevenZip, ["a", "-y", output, `.${sep}*`], { cwd: root, signal });
  }
}
