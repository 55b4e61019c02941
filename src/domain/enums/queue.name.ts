export const QueueNames = ["default", "audio_processing", "image_processing", "maintenance"] as const;
export type QueueName = typeof QueueNames[number];

export const JobNames = ["conversion.run", "audio.transcribe", "images.gif", "maintenance.cleanup"] as const;
export type JobName = typeof JobNames[number];

export const QueueJobStatuses = ["pending", "active", "completed", "failed", "revoked"] as const;
export type QueueJobStatus = typeof QueueJobStatuses[number];

export function isQueueName(value: unknown): value is QueueName {
  return typeof value === "string" && QueueNames.some((name) => name === value);
}

export function isJobName(value: unknown): value is JobName {
  return typeof value === "string" && JobNames.some((name) => name === value);
}

export function isQueueJobStatus(value: unknown): value is QueueJobStatus {
  return typeof value === "string" && QueueJobStatuses.some((status) => status === value);
}
