import { QueueJob } from "../../domain/entities/queue-job";
import { JobContext, JobHandlers } from "./task.worker";

type TaskJobRunner = (params: { taskId: string; context: JobContext }) => Promise<void>;

export interface JobRunners {
  runConversion: TaskJobRunner;
  transcribeAudio: TaskJobRunner;
  buildGif: TaskJobRunner;
  cleanup: () => Promise<unknown>;
}

function taskIdOf(job: QueueJob): string {
  const { taskId } = job.payload;
  if (!taskId) {
    throw new Error(`Job ${job.id} (${job.name}) has no taskId in its payload`);
  }
  return taskId;
}

/** Maps each job name to the use case that processes it. */
export function createJobHandlers(runners: JobRunners): JobHandlers {
  return {
    "conversion.run": async (job, context) => runners.runConversion({ taskId: taskIdOf(job), context }),
    "audio.transcribe": async (job, context) => runners.transcribeAudio({ taskId: taskIdOf(job), context }),
    "images.gif": async (job, context) => runners.buildGif({ taskId: taskIdOf(job), context }),
    "maintenance.cleanup": async () => {
      await runners.cleanup();
    },
  };
}
