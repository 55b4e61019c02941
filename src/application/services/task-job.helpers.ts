import { dirname } from "path";
import { ConversionTask, TaskInputFile } from "../../domain/entities/conversion-task";
import { JobContext, JobRevokedError } from "../../infrastructure/queue/task.worker";
import { MediaStorage } from "../../infrastructure/storage/media.storage";

/** True when no retry will follow this run: last attempt, or the job was revoked. */
export function isLastRun(context: Pick<JobContext, "isFinalAttempt" | "signal">): boolean {
  return context.isFinalAttempt || (context.signal.aborted && context.signal.reason instanceof JobRevokedError);
}

/** Removes the task's inputs, along with the work directory a download was saved into. */
export async function removeInputFiles(storage: MediaStorage, files: TaskInputFile[]): Promise<void> {
  for (const file of files) {
    const parent = dirname(file.path);
    await storage.remove(storage.isWorkDir(parent) ? parent : file.path);
  }
}

/** Result files of a task: its output plus every file listed under `metadata.output_files`. */
export function taskOutputPaths(storage: MediaStorage, task: Pick<ConversionTask, "outputPath" | "metadata">): string[] {
  const paths = new Set<string>();
  if (task.outputPath) {
    paths.add(task.outputPath);
  }
  const listed = task.metadata.output_files;
  if (listed && typeof listed === "object" && !Array.isArray(listed)) {
    for (const url of Object.values(listed)) {
      const path = typeof url === "string" ? storage.pathFromUrl(url) : null;
      if (path) {
        paths.add(path);
      }
    }
  }
  return [...paths];
}

export async function removeTaskFiles(storage: MediaStorage, task: ConversionTask): Promise<void> {
  await removeInputFiles(storage, task.inputFiles);
  for (const path of taskOutputPaths(storage, task)) {
    await storage.remove(path);
  }
}
