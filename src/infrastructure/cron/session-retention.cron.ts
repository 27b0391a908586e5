import * as cron from "node-cron";
import type { CleanupExpiredSessionsUseCase } from "../../application/use-cases/cleanup-expired-sessions.use-case";

export class SessionRetentionCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private cleanupExpiredSessionsUseCase: CleanupExpiredSessionsUseCase,
    private maxAgeDays: number
  ) {}

  /**
   * Start the cron job to run daily at 03:00
   */
  start(): void {
    if (this.task) {
      console.log("[SessionRetentionCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("0 3 * * *", () => this.run());
    console.log(`[SessionRetentionCron] Started cron job to delete sessions older than ${this.maxAgeDays} days (runs daily)`);
  }

  async run(): Promise<void> {
    if (this.isRunning) {
      console.log("[SessionRetentionCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    try {
      await this.cleanupExpiredSessionsUseCase.execute({ maxAgeDays: this.maxAgeDays });
    } catch (error) {
      console.error("[SessionRetentionCron] Error in retention cycle:", error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[SessionRetentionCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
