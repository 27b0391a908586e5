import type { AggregatedTranscript } from "../../domain/entities/session-transcript";

export interface TranscriptResponse {
  sessionId: string;
  fullTranscript: string;
  totalChunks: number;
  completedChunks: number;
  failedChunks: number;
  confidenceScore: number;
  totalDurationSeconds: number;
  segments: Array<{
    sequenceIndex: number;
    start: number;
    end: number;
    text: string;
    confidence: number;
  }>;
}

export function toTranscriptResponse(transcript: AggregatedTranscript): TranscriptResponse {
  return {
    sessionId: transcript.sessionId,
    fullTranscript: transcript.fullTranscript,
    totalChunks: transcript.totalChunks,
    completedChunks: transcript.completedChunks,
    failedChunks: transcript.failedChunks,
    confidenceScore: transcript.confidenceScore,
    totalDurationSeconds: transcript.totalDurationSeconds,
    segments: transcript.segments.map((s) => ({
      sequenceIndex: s.sequenceIndex,
      start: s.start,
      end: s.end,
      text: s.text,
      confidence: s.confidence,
    })),
  };
}
