import { JobName, QueueName } from "../../domain/enums/queue.name";

export interface JobDefinition {
  queue: QueueName;
  maxRetries: number;
  retryDelayMs: number;
  timeLimitMs: number;
}

const SECOND = 1000;

export const JOB_DEFINITIONS: Record<JobName, JobDefinition> = {
  "conversion.run": { queue: "default", maxRetries: 3, retryDelayMs: 60 * SECOND, timeLimitMs: 1800 * SECOND },
  "audio.transcribe": { queue: "audio_processing", maxRetries: 2, retryDelayMs: 120 * SECOND, timeLimitMs: 3600 * SECOND },
  "images.gif": { queue: "image_processing", maxRetries: 2, retryDelayMs: 60 * SECOND, timeLimitMs: 1800 * SECOND },
  "maintenance.cleanup": { queue: "maintenance", maxRetries: 1, retryDelayMs: 60 * SECOND, timeLimitMs: 300 * SECOND },
};
