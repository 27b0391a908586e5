import type { SessionStatus } from "../enums/session.status";

export interface Session {
  id: string; // caller-supplied session id
  status: SessionStatus;
  totalChunksExpected?: number; // may arrive with any chunk, not only the first
  chunkCount: number;
  totalDurationSeconds: number; // sum of the stored chunks' durations
  failureReason?: string;
  completedAt?: Date; // set once, together with status "completed"
  failedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionProgressUpdate {
  chunkCount: number;
  totalDurationSeconds: number;
  totalChunksExpected?: number;
}

export interface SessionTransitionDetails {
  completedAt?: Date;
  failedAt?: Date;
  failureReason?: string;
}
