import type { Chunk } from "../../domain/entities/chunk";
import type { AggregatedSegment, AggregatedTranscript } from "../../domain/entities/session-transcript";

export interface OverlapOptions {
  wordsPerSecond: number;
  charsPerWord: number;
  maxOverlapChars: number;
}

export const DEFAULT_OVERLAP_OPTIONS: OverlapOptions = {
  wordsPerSecond: 2.5,
  charsPerWord: 6,
  maxOverlapChars: 50,
};

// Speech rate varies a lot between speakers; search twice the expected overlap
const OVERLAP_WINDOW_SLACK = 2;

const WORD_CHAR = /[\p{L}\p{N}']/u;
const HAS_WORD = /[\p{L}\p{N}]/u;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

/**
 * Number of leading characters of the next chunk's text that may repeat the
 * previous chunk, derived from the declared overlap duration.
 */
export function overlapWindowChars(overlapSeconds: number, options: OverlapOptions = DEFAULT_OVERLAP_OPTIONS): number {
  if (!(overlapSeconds > 0)) {
    return 0;
  }
  const estimate = overlapSeconds * options.wordsPerSecond * options.charsPerWord * OVERLAP_WINDOW_SLACK;
  return Math.min(options.maxOverlapChars, Math.ceil(estimate));
}

/**
 * Length of the prefix of `next` that repeats the end of `accumulated`
 * (case-insensitive). A repeat of the whole window is taken as is; shorter
 * repeats must start and end on word boundaries in both texts and contain at
 * least one word.
 */
export function findOverlapLength(accumulated: string, next: string, windowChars: number): number {
  if (windowChars > 0 && next.length >= windowChars && accumulated.length >= windowChars) {
    const window = next.slice(0, windowChars).toLowerCase();
    if (accumulated.slice(-windowChars).toLowerCase() === window) {
      return windowChars;
    }
  }

  const limit = Math.min(windowChars, next.length, accumulated.length);

  for (let length = limit; length > 0; length--) {
    if (isWordChar(next[length - 1]) && isWordChar(next[length])) {
      continue;
    }
    const start = accumulated.length - length;
    if (isWordChar(accumulated[start - 1]) && isWordChar(accumulated[start])) {
      continue;
    }
    const candidate = next.slice(0, length);
    if (!HAS_WORD.test(candidate)) {
      continue;
    }
    if (accumulated.slice(start).toLowerCase() === candidate.toLowerCase()) {
      return length;
    }
  }

  return 0;
}

export function appendWithOverlap(accumulated: string, next: string, windowChars: number): string {
  if (!accumulated) {
    return next;
  }
  if (!next) {
    return accumulated;
  }

  const overlap = findOverlapLength(accumulated, next, windowChars);
  if (overlap > 0) {
    return accumulated + next.slice(overlap);
  }
  return `${accumulated} ${next}`;
}

/**
 * Merges a session's chunk transcripts into one transcript.
 */
export class TranscriptAggregator {
  constructor(private readonly options: OverlapOptions = DEFAULT_OVERLAP_OPTIONS) {}

  aggregate(sessionId: string, chunks: readonly Chunk[]): AggregatedTranscript {
    const ordered = [...chunks].sort((a, b) => a.sequenceIndex - b.sequenceIndex);

    let fullTranscript = "";
    let confidenceTotal = 0;
    let completedChunks = 0;
    let failedChunks = 0;
    let totalDurationSeconds = 0;
    const segments: AggregatedSegment[] = [];

    for (const chunk of ordered) {
      totalDurationSeconds += chunk.durationSeconds ?? 0;

      if (chunk.transcriptionStatus === "failed" || chunk.uploadStatus === "failed") {
        failedChunks++;
        continue;
      }
      if (chunk.transcriptionStatus !== "completed") {
        continue;
      }

      completedChunks++;
      confidenceTotal += chunk.confidenceScore ?? 0;

      const text = (chunk.transcriptText ?? "").trim();
      const window = fullTranscript ? overlapWindowChars(chunk.overlapSeconds, this.options) : 0;
      fullTranscript = appendWithOverlap(fullTranscript, text, window);

      for (const segment of chunk.segments) {
        segments.push({ ...segment, sequenceIndex: chunk.sequenceIndex });
      }
    }

    return {
      sessionId,
      fullTranscript,
      totalChunks: ordered.length,
      completedChunks,
      failedChunks,
      confidenceScore: completedChunks > 0 ? confidenceTotal / completedChunks : 0,
      totalDurationSeconds,
      segments,
    };
  }
}
