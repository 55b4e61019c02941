import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/** Last non-empty stderr line of a failed child process, if it printed one. */
function failureDetail(error: unknown): string | undefined {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    const lines = error.stderr.trim().split("\n").filter((line) => line.trim().length > 0);
    return lines[lines.length - 1];
  }
  return undefined;
}

/**
 * Runs a binary without a shell, so arguments never need quoting.
 */
export async function runCommand(command: string, args: string[], options: CommandOptions = {}): Promise<CommandOutput> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      signal: options.signal,
      maxBuffer: 64 * 1024 * 1024,
      encoding: "utf8",
    });
    return { stdout, stderr };
  } catch (error: unknown) {
    if (options.signal?.aborted) {
      throw options.signal.reason instanceof Error ? options.signal.reason : new Error(`${command} was aborted`);
    }
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`${command} is not installed or not available in PATH`);
    }
    const detail = failureDetail(error);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${command} failed: ${detail ?? message}`);
  }
}

const availabilityCache = new Map<string, boolean>();

export async function isCommandAvailable(command: string, versionArgs: string[] = ["-version"]): Promise<boolean> {
  const key = `${command} ${versionArgs.join(" ")}`;
  const cached = availabilityCache.get(key);
  if (cached !== undefined) {
    return cached;
  }
  try {
    await execFileAsync(command, versionArgs, { timeout: 10000 });
    availabilityCache.set(key, true);
  } catch {
    availabilityCache.set(key, false);
  }
  return availabilityCache.get(key) === true;
}
