import JSZip from "jszip";
import { readFile } from "fs/promises";
import { ValidationError } from "../../domain/errors/app.error";
import { IConversionTaskRepository } from "../../domain/interfaces/iconversion-task.repository";
import { batchArchiveName, batchEntryName } from "../../domain/utils/file.naming";
import { MediaStorage } from "../../infrastructure/storage/media.storage";

export const MAX_BATCH_TASKS = 50;

export interface BatchArchive {
  filename: string;
  content: Buffer;
  totalTasks: number;
  successfulTasks: number;
  filesCount: number;
  entries: string[];
}

/** Accepts a comma list or an array of ids; blanks and duplicates are dropped. */
export function parseTaskIds(value: unknown): string[] {
  const raw: unknown[] = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
  const ids: string[] = [];
  for (const item of raw) {
    if (typeof item !== "string") {
      continue;
    }
    const id = item.trim();
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

export class BuildBatchArchiveUseCase {
  constructor(
    private taskRepository: IConversionTaskRepository,
    private storage: MediaStorage
  ) {}

  async execute(params: { taskIds: unknown; now?: Date }): Promise<BatchArchive> {
    const ids = parseTaskIds(params.taskIds);
    if (ids.length === 0) {
      throw new ValidationError("task_ids is required");
    }
    if (ids.length > MAX_BATCH_TASKS) {
      throw new ValidationError(`At most ${MAX_BATCH_TASKS} tasks can be downloaded at once`);
    }

    const tasks = (await this.taskRepository.findByIds(ids)).filter((task) => task.status === "done");
    if (tasks.length === 0) {
      throw new ValidationError("None of the requested tasks are completed");
    }

    const zip = new JSZip();
    const taken = new Set<string>();
    for (const task of tasks) {
      if (!task.outputPath || !(await this.storage.exists(task.outputPath))) {
        console.warn(`[BuildBatchArchive] Result file missing for task ${task.id}`);
        continue;
      }
      const name = batchEntryName(task.id, task.originalFilename, task.targetFormat, taken);
      taken.add(name);
      zip.file(name, await readFile(task.outputPath));
    }

    if (taken.size === 0) {
      throw new ValidationError("No result files are available for the requested tasks");
    }

    const content = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
    return {
      filename: batchArchiveName(params.now ?? new Date()),
      content,
      totalTasks: ids.length,
      successfulTasks: tasks.length,
      filesCount: taken.size,
      entries: [...taken],
    };
  }
}
