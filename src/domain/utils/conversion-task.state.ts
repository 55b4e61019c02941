import { ConversionTask, JsonObject } from "../entities/conversion-task";
import { TaskStatus, TaskStatuses } from "../enums/task.status";

/**
 * Allowed status moves. A task never leaves `done` or `failed`, and `running`
 * may be re-entered when a retried job starts again.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  queued: ["running", "done", "failed"],
  running: ["running", "done", "failed"],
  done: [],
  failed: [],
};

export interface TaskTransition {
  from: readonly TaskStatus[];
  updates: Partial<ConversionTask>;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Statuses a task may be in for a move to `to` to be accepted. */
export function sourcesFor(to: TaskStatus): TaskStatus[] {
  return TaskStatuses.filter((from) => canTransition(from, to));
}

export function isFinished(task: Pick<ConversionTask, "status">): boolean {
  return task.status === "done" || task.status === "failed";
}

export function isActive(task: Pick<ConversionTask, "status">): boolean {
  return task.status === "queued" || task.status === "running";
}

export function isValidProgress(progress: number): boolean {
  return Number.isFinite(progress) && progress >= 0 && progress <= 100;
}

export function startTransition(task: ConversionTask, now: Date = new Date()): TaskTransition {
  return {
    from: sourcesFor("running"),
    updates: { status: "running", startedAt: task.startedAt ?? now },
  };
}

export function progressTransition(progress: number): TaskTransition | null {
  if (!isValidProgress(progress)) {
    return null;
  }
  return {
    from: ["queued", "running"],
    updates: { progress: Math.floor(progress) },
  };
}

export function completeTransition(
  task: ConversionTask,
  result: { outputPath?: string; metadata?: JsonObject },
  now: Date = new Date()
): TaskTransition {
  const updates: Partial<ConversionTask> = {
    status: "done",
    progress: 100,
    completedAt: now,
    metadata: { ...task.metadata, ...(result.metadata ?? {}) },
  };
  if (result.outputPath) {
    updates.outputPath = result.outputPath;
  }
  return { from: sourcesFor("done"), updates };
}

export function failTransition(message: string, now: Date = new Date()): TaskTransition {
  return {
    from: sourcesFor("failed"),
    updates: { status: "failed", errorMessage: message, completedAt: now },
  };
}

/** Seconds between start and completion (or now while running); null before start. */
export function durationSeconds(
  task: Pick<ConversionTask, "startedAt" | "completedAt">,
  now: Date = new Date()
): number | null {
  if (!task.startedAt) {
    return null;
  }
  const end = task.completedAt ?? now;
  return (end.getTime() - task.startedAt.getTime()) / 1000;
}
