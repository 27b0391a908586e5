import * as cron from "node-cron";
import type { ContentAddressedCache } from "../../application/services/content-addressed.cache";

export class CacheCleanupCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(private cache: ContentAddressedCache) {}

  /**
   * Start the cron job to run at the top of every hour
   */
  start(): void {
    if (this.task) {
      console.log("[CacheCleanupCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("0 * * * *", () => this.run());
    console.log("[CacheCleanupCron] Started cron job to evict expired cache entries (runs hourly)");
  }

  async run(): Promise<void> {
    if (this.isRunning) {
      console.log("[CacheCleanupCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();
    try {
      const result = await this.cache.cleanup();
      console.log(
        `[CacheCleanupCron] Cleanup completed in ${Date.now() - startTime}ms: ` +
          `${result.deletedEntries} entries, ${result.deletedBytes} bytes${result.aggressive ? " (size limit reached)" : ""}`
      );
    } catch (error) {
      console.error(`[CacheCleanupCron] Error in cleanup (${Date.now() - startTime}ms):`, error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[CacheCleanupCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
