export const TaskStatuses = ["queued", "running", "done", "failed"] as const;
export type TaskStatus = typeof TaskStatuses[number];

export const ACTIVE_STATUSES: readonly TaskStatus[] = ["queued", "running"];
export const FINISHED_STATUSES: readonly TaskStatus[] = ["done", "failed"];

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === "string" && TaskStatuses.some((status) => status === value);
}
