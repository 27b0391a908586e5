import { randomUUID } from "crypto";
import type { Chunk } from "../../domain/entities/chunk";
import type { Session } from "../../domain/entities/session";
import type { AggregatedTranscript } from "../../domain/entities/session-transcript";
import { isSettled } from "../../domain/enums/chunk.status";
import type { SessionStatus } from "../../domain/enums/session.status";
import { ConflictError, NotFoundError, errorMessage } from "../../domain/errors/app.errors";
import type { IChunkRepository } from "../../domain/interfaces/ichunk.repository";
import type { IEventNotifier } from "../../domain/interfaces/ievent.notifier";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { ISessionTranscriptRepository } from "../../domain/interfaces/isession-transcript.repository";
import type { ContentAddressedCache } from "./content-addressed.cache";
import type { TranscriptAggregator } from "./transcript.aggregator";

export type FinishedOutcome =
  | { status: "completed"; session: Session; transcript: AggregatedTranscript }
  | { status: "failed"; session: Session; reason: string };

export type CompletionOutcome =
  | { status: "not_ready"; reason: string }
  | { status: "already_finished"; session: Session }
  | FinishedOutcome;

/**
 * Moves sessions to their terminal state once every expected chunk has been
 * transcribed (or has failed), and announces the outcome.
 */
export class SessionLifecycleService {
  constructor(
    private readonly sessionRepository: ISessionRepository,
    private readonly chunkRepository: IChunkRepository,
    private readonly transcriptRepository: ISessionTranscriptRepository,
    private readonly aggregator: TranscriptAggregator,
    private readonly notifier: IEventNotifier,
    private readonly cache?: ContentAddressedCache
  ) {}

  /**
   * Completes the session if it is ready. Safe to call any number of times
   * from any number of workers; only one caller performs the transition.
   */
  async checkCompletion(sessionId: string): Promise<CompletionOutcome> {
    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      return { status: "not_ready", reason: "session not found" };
    }
    if (session.status === "completed" || session.status === "failed") {
      return { status: "already_finished", session };
    }
    if (session.totalChunksExpected === undefined) {
      return { status: "not_ready", reason: "total chunk count not known yet" };
    }

    const chunks = await this.chunkRepository.findBySessionId(sessionId);
    const finalIndex = session.totalChunksExpected - 1;
    if (!chunks.some((chunk) => chunk.sequenceIndex === finalIndex)) {
      return { status: "not_ready", reason: `final chunk ${finalIndex} not uploaded` };
    }
    const unsettled = chunks.filter((chunk) => !isSettled(chunk.transcriptionStatus));
    if (unsettled.length > 0) {
      return { status: "not_ready", reason: `${unsettled.length} chunks still transcribing` };
    }

    return this.finish(session, chunks, ["receiving"]);
  }

  /**
   * Completes the session with whatever has been transcribed so far.
   */
  async finalize(sessionId: string): Promise<FinishedOutcome> {
    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }
    if (session.status === "completed" || session.status === "failed") {
      throw new ConflictError(`Session ${sessionId} is already ${session.status}`);
    }

    const chunks = await this.chunkRepository.findBySessionId(sessionId);
    const outcome = await this.finish(session, chunks, ["open", "receiving"]);
    if (outcome.status === "already_finished") {
      throw new ConflictError(`Session ${sessionId} is already ${outcome.session.status}`);
    }
    return outcome;
  }

  private async finish(
    session: Session,
    chunks: Chunk[],
    from: readonly SessionStatus[]
  ): Promise<FinishedOutcome | { status: "already_finished"; session: Session }> {
    const transcript = this.aggregator.aggregate(session.id, chunks);

    if (transcript.completedChunks === 0) {
      const reason = chunks.length === 0 ? "No chunks were uploaded" : "No chunk could be transcribed";
      const failedAt = new Date();
      const failed = await this.sessionRepository.transitionStatus(session.id, from, "failed", {
        failedAt,
        failureReason: reason,
      });
      if (!failed) {
        return this.alreadyFinished(session);
      }

      console.log(`[SessionLifecycle] Session ${session.id} failed: ${reason}`);
      this.notifier.notify({
        type: "session.failed",
        sessionId: session.id,
        occurredAt: failedAt,
        payload: { reason, totalChunks: transcript.totalChunks },
      });
      return { status: "failed", session: failed, reason };
    }

    const completedAt = new Date();
    const completed = await this.sessionRepository.transitionStatus(session.id, from, "completed", { completedAt });
    if (!completed) {
      return this.alreadyFinished(session);
    }

    console.log(
      `[SessionLifecycle] Session ${session.id} completed: ${transcript.completedChunks}/${transcript.totalChunks} chunks transcribed`
    );

    try {
      await this.transcriptRepository.create({ ...transcript, id: randomUUID(), createdAt: completedAt });
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      console.warn(`[SessionLifecycle] Transcript for session ${session.id} already stored`);
    }

    this.notifier.notify({
      type: "session.completed",
      sessionId: session.id,
      occurredAt: completedAt,
      payload: {
        fullTranscript: transcript.fullTranscript,
        totalChunks: transcript.totalChunks,
        completedChunks: transcript.completedChunks,
        confidenceScore: transcript.confidenceScore,
        segments: transcript.segments,
        completedAt,
      },
    });

    if (this.cache) {
      try {
        await this.cache.cleanup();
      } catch (error) {
        console.warn(`[SessionLifecycle] Cache cleanup after session ${session.id} failed: ${errorMessage(error)}`);
      }
    }

    return { status: "completed", session: completed, transcript };
  }

  private async alreadyFinished(session: Session): Promise<{ status: "already_finished"; session: Session }> {
    const current = await this.sessionRepository.findById(session.id);
    return { status: "already_finished", session: current ?? session };
  }
}
