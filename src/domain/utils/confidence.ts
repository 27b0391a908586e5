import type { ChunkSegment } from "../entities/chunk";

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Mean of segment confidences weighted by segment duration.
 * Zero-length segments carry no weight; no weight at all gives 0.
 */
export function weightedConfidence(segments: readonly ChunkSegment[]): number {
  let weighted = 0;
  let totalDuration = 0;

  for (const segment of segments) {
    const duration = Math.max(0, segment.end - segment.start);
    weighted += clampConfidence(segment.confidence) * duration;
    totalDuration += duration;
  }

  return totalDuration > 0 ? weighted / totalDuration : 0;
}
