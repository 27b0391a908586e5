import type { ChunkSegment } from "./chunk";

export interface AggregatedSegment extends ChunkSegment {
  sequenceIndex: number; // chunk the segment came from; timings stay chunk-relative
}

export interface AggregatedTranscript {
  sessionId: string;
  fullTranscript: string;
  totalChunks: number;
  completedChunks: number;
  failedChunks: number;
  confidenceScore: number;
  totalDurationSeconds: number;
  segments: AggregatedSegment[];
}

/**
 * The transcript captured when a session completes. At most one per session.
 */
export interface SessionTranscript extends AggregatedTranscript {
  id: string;
  createdAt: Date;
}
