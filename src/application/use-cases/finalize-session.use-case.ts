import type { FinishedOutcome, SessionLifecycleService } from "../services/session-lifecycle.service";

export class FinalizeSessionUseCase {
  constructor(private lifecycle: SessionLifecycleService) {}

  async execute(sessionId: string): Promise<FinishedOutcome> {
    console.log(`[FinalizeSession] Finalizing session ${sessionId} on request`);
    return this.lifecycle.finalize(sessionId);
  }
}
