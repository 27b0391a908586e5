export interface TranscriptionRequest {
  audio: Buffer;
  filename: string;
  mimeType: string;
  language?: string; // ISO-639-1 hint
}

export interface TranscribedSegment {
  start: number;
  end: number;
  text: string;
  confidence: number;
}

export interface TranscriptionResult {
  text: string;
  segments: TranscribedSegment[];
  language: string;
  durationSeconds: number;
}

export type TranscriptionFailureKind = "timeout" | "rate_limit" | "transient" | "rejected";

export type TranscriptionOutcome =
  | { ok: true; result: TranscriptionResult }
  | { ok: false; kind: TranscriptionFailureKind; message: string };

export interface ITranscriptionProvider {
  transcribe(request: TranscriptionRequest, options: { timeoutMs: number }): Promise<TranscriptionOutcome>;
}
