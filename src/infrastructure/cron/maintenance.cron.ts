import * as cron from "node-cron";
import { ITaskQueue } from "../../domain/interfaces/itask.queue";

/**
 * Enqueues the daily file and task cleanup on the maintenance queue, so
 * whichever worker consumes that queue does the work.
 */
export class MaintenanceCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private taskQueue: ITaskQueue,
    private schedule = "0 3 * * *"
  ) {}

  start(): void {
    if (this.task) {
      console.log("[MaintenanceCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule(this.schedule, () => this.runCycle());
    console.log(`[MaintenanceCron] Started cron job (${this.schedule})`);
  }

  async runCycle(): Promise<void> {
    if (this.isRunning) {
      console.log("[MaintenanceCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    try {
      const job = await this.taskQueue.enqueue("maintenance.cleanup", {});
      console.log(`[MaintenanceCron] Cleanup job ${job.id} enqueued`);
    } catch (error: unknown) {
      console.error("[MaintenanceCron] Failed to enqueue cleanup job:", error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[MaintenanceCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
