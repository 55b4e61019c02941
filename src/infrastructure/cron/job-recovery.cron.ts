import * as cron from "node-cron";
import { ResumeIncompleteJobsUseCase } from "../../application/use-cases/resume-incomplete-jobs.use-case";

export class JobRecoveryCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(private resumeIncompleteJobsUseCase: ResumeIncompleteJobsUseCase) {}

  /**
   * Start the cron job to run every 5 minutes
   */
  start(): void {
    if (this.task) {
      console.log("[JobRecoveryCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("*/5 * * * *", () => this.runCycle());
    console.log("[JobRecoveryCron] Started cron job to recover queue jobs (runs every 5 minutes)");
  }

  async runCycle(): Promise<void> {
    if (this.isRunning) {
      console.log("[JobRecoveryCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const result = await this.resumeIncompleteJobsUseCase.execute();
      console.log(
        `[JobRecoveryCron] Recovery cycle completed in ${Date.now() - startTime}ms: ` +
          `${result.released} released, ${result.failed} failed, ${result.purged} purged`
      );
    } catch (error: unknown) {
      console.error(`[JobRecoveryCron] Error in recovery cycle (${Date.now() - startTime}ms):`, error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[JobRecoveryCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
