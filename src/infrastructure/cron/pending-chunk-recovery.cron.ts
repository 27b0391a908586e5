import * as cron from "node-cron";
import type {
  ResumePendingChunksUseCase,
  ResumePendingChunksUseCaseParams,
} from "../../application/use-cases/resume-pending-chunks.use-case";

export class PendingChunkRecoveryCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private resumePendingChunksUseCase: ResumePendingChunksUseCase,
    private params: ResumePendingChunksUseCaseParams
  ) {}

  /**
   * Start the cron job to run every minute
   */
  start(): void {
    if (this.task) {
      console.log("[PendingChunkRecoveryCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("*/1 * * * *", () => this.run());
    console.log("[PendingChunkRecoveryCron] Started cron job to re-queue stalled chunks (runs every minute)");
  }

  async run(): Promise<void> {
    if (this.isRunning) {
      console.log("[PendingChunkRecoveryCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    try {
      await this.resumePendingChunksUseCase.execute(this.params);
    } catch (error) {
      console.error("[PendingChunkRecoveryCron] Error in recovery cycle:", error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[PendingChunkRecoveryCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
