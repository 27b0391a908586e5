import type { AggregatedSegment } from "../entities/session-transcript";

interface BaseSessionEvent {
  sessionId: string;
  occurredAt: Date;
}

export interface ChunkUploadedEvent extends BaseSessionEvent {
  type: "chunk.uploaded";
  payload: {
    chunkId: string;
    sequenceIndex: number;
    sizeBytes: number;
    overlapSeconds: number;
    questionId?: string;
    totalChunksExpected?: number;
    isFinalChunk: boolean;
    replaced: boolean;
  };
}

export interface SessionCompletedEvent extends BaseSessionEvent {
  type: "session.completed";
  payload: {
    fullTranscript: string;
    totalChunks: number;
    completedChunks: number;
    confidenceScore: number;
    segments: AggregatedSegment[];
    completedAt: Date;
  };
}

export interface SessionFailedEvent extends BaseSessionEvent {
  type: "session.failed";
  payload: {
    reason: string;
    totalChunks: number;
  };
}

export type SessionEvent = ChunkUploadedEvent | SessionCompletedEvent | SessionFailedEvent;

export type SessionEventHandler = (event: SessionEvent) => void | Promise<void>;

export interface IEventNotifier {
  /** Returns immediately; delivery happens in the background and never throws to the caller. */
  notify(event: SessionEvent): void;
}
