import { CommandOutput, isCommandAvailable, runCommand } from "../system/command.runner";

export interface FfmpegBinaries {
  ffmpeg: string;
  ffprobe: string;
}

export interface MediaDimensions {
  width: number;
  height: number;
}

export class FfmpegRunner {
  constructor(private binaries: FfmpegBinaries) {}

  isAvailable(): Promise<boolean> {
    return isCommandAvailable(this.binaries.ffmpeg);
  }

  isProbeAvailable(): Promise<boolean> {
    return isCommandAvailable(this.binaries.ffprobe);
  }

  async ensureAvailable(): Promise<void> {
    if (!(await this.isAvailable())) {
      throw new Error("ffmpeg is not installed or not available in PATH. Please install ffmpeg to convert media.");
    }
  }

  /** Runs ffmpeg, overwriting outputs. Diagnostics (filter stats) arrive on stderr. */
  run(args: string[], signal?: AbortSignal): Promise<CommandOutput> {
    return runCommand(this.binaries.ffmpeg, ["-hide_banner", "-nostdin", "-y", ...args], { signal });
  }

  async probeDuration(path: string, signal?: AbortSignal): Promise<number> {
    const { stdout } = await runCommand(
      this.binaries.ffprobe,
      ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", path],
      { signal }
    );
    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new Error(`Could not determine media duration of ${path}`);
    }
    return duration;
  }

  async probeDimensions(path: string, signal?: AbortSignal): Promise<MediaDimensions> {
    const { stdout } = await runCommand(
      this.binaries.ffprobe,
      ["-v", "error", "-select_streams", "v:0", "-show_entries", "stream=width,height", "-of", "csv=s=x:p=0", path],
      { signal }
    );
    const [width, height] = stdout.trim().split("x").map((part) => parseInt(part, 10));
    if (!width || !height) {
      throw new Error(`Could not determine video dimensions of ${path}`);
    }
    return { width, height };
  }
}
