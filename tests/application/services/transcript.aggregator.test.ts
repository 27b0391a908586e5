import { describe, expect, it } from "vitest";
import {
  TranscriptAggregator,
  appendWithOverlap,
  findOverlapLength,
  overlapWindowChars,
} from "../../../src/application/services/transcript.aggregator";
import { makeChunk } from "../../helpers/fakes";

const SHARED = "tell me about a project you led from start to end.";

describe("overlapWindowChars", () => {
  it("scales with the overlap duration and caps at the maximum", () => {
    expect(overlapWindowChars(1)).toBe(30);
    expect(overlapWindowChars(2)).toBe(50);
    expect(overlapWindowChars(0)).toBe(0);
  });
});

describe("findOverlapLength", () => {
  it("matches the longest word-aligned repeat case-insensitively", () => {
    expect(findOverlapLength("hello there", "There, how are you", 50)).toBe(5);
  });

  it("ignores matches that split a word", () => {
    expect(findOverlapLength("we went north", "northern lights", 50)).toBe(0);
    expect(findOverlapLength("it was a bother", "other things", 50)).toBe(0);
  });

  it("takes a full-window repeat even when it starts mid-word", () => {
    expect(findOverlapLength("a project", "oject plan", 5)).toBe(5);
    expect(findOverlapLength("a PROJECT", "oject plan", 5)).toBe(5);
  });

  it("never looks past the window", () => {
    expect(findOverlapLength("so the big idea", "the big idea is", 5)).toBe(0);
    expect(findOverlapLength("so the big idea", "the big idea is", 12)).toBe(12);
  });

  it("does not treat punctuation alone as overlap", () => {
    expect(findOverlapLength("done.", ". Next", 50)).toBe(0);
  });
});

describe("appendWithOverlap", () => {
  it("drops the repeated prefix", () => {
    expect(appendWithOverlap("hello there", "there, how are you", 50)).toBe("hello there, how are you");
  });

  it("joins with a single space when nothing repeats", () => {
    expect(appendWithOverlap("first part", "second part", 50)).toBe("first part second part");
  });

  it("handles empty sides", () => {
    expect(appendWithOverlap("", "start", 50)).toBe("start");
    expect(appendWithOverlap("end", "", 50)).toBe("end");
  });
});

describe("TranscriptAggregator", () => {
  const aggregator = new TranscriptAggregator();

  it("removes a fifty character overlap between consecutive chunks", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, transcriptText: `Good morning and welcome. ${SHARED}`, confidenceScore: 0.9 }),
      makeChunk({ sequenceIndex: 1, transcriptText: `${SHARED} What was the hardest part?`, confidenceScore: 0.8 }),
    ]);

    expect(SHARED).toHaveLength(50);
    expect(result.fullTranscript).toBe(
      "Good morning and welcome. tell me about a project you led from start to end. What was the hardest part?"
    );
  });

  it("keeps a fifty character overlap once when it does not start on a word", () => {
    const first = "We talked about distributed systems and caching layers for hours";
    const shared = first.slice(-50);
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, transcriptText: first }),
      makeChunk({ sequenceIndex: 1, transcriptText: `${shared} and then we moved on` }),
    ]);

    expect(shared.startsWith("t distributed")).toBe(true);
    expect(result.fullTranscript).toBe(`${first} and then we moved on`);
    expect(result.fullTranscript.split(shared)).toHaveLength(2);
  });

  it("keeps repeated words when the chunk declares no overlap", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, transcriptText: "hello there" }),
      makeChunk({ sequenceIndex: 1, transcriptText: "there again", overlapSeconds: 0 }),
    ]);

    expect(result.fullTranscript).toBe("hello there there again");
  });

  it("orders chunks by sequence index regardless of input order", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 2, transcriptText: "third" }),
      makeChunk({ sequenceIndex: 0, transcriptText: "first" }),
      makeChunk({ sequenceIndex: 1, transcriptText: "second" }),
    ]);

    expect(result.fullTranscript).toBe("first second third");
  });

  it("averages confidence over completed chunks only and counts failures", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, transcriptText: "one", confidenceScore: 0.9, durationSeconds: 30 }),
      makeChunk({ sequenceIndex: 1, transcriptText: "two", confidenceScore: 0.6, durationSeconds: 20 }),
      makeChunk({ sequenceIndex: 2, transcriptionStatus: "failed" }),
    ]);

    expect(result.totalChunks).toBe(3);
    expect(result.completedChunks).toBe(2);
    expect(result.failedChunks).toBe(1);
    expect(result.confidenceScore).toBeCloseTo(0.75, 10);
    expect(result.totalDurationSeconds).toBe(50);
    expect(result.fullTranscript).toBe("one two");
  });

  it("counts a chunk whose upload failed as failed", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, uploadStatus: "failed", transcriptionStatus: "pending" }),
    ]);

    expect(result.failedChunks).toBe(1);
    expect(result.completedChunks).toBe(0);
    expect(result.confidenceScore).toBe(0);
    expect(result.fullTranscript).toBe("");
  });

  it("leaves chunks still transcribing out of the text", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({ sequenceIndex: 0, transcriptText: "ready" }),
      makeChunk({ sequenceIndex: 1, transcriptionStatus: "processing" }),
    ]);

    expect(result.fullTranscript).toBe("ready");
    expect(result.totalChunks).toBe(2);
    expect(result.completedChunks).toBe(1);
    expect(result.failedChunks).toBe(0);
  });

  it("tags segments with their chunk index and keeps chunk-relative timing", () => {
    const result = aggregator.aggregate("session-1", [
      makeChunk({
        sequenceIndex: 1,
        transcriptText: "b",
        segments: [{ start: 0, end: 4, text: "b", confidence: 0.5 }],
      }),
      makeChunk({
        sequenceIndex: 0,
        transcriptText: "a",
        segments: [{ start: 0, end: 3, text: "a", confidence: 0.7 }],
      }),
    ]);

    expect(result.segments).toEqual([
      { start: 0, end: 3, text: "a", confidence: 0.7, sequenceIndex: 0 },
      { start: 0, end: 4, text: "b", confidence: 0.5, sequenceIndex: 1 },
    ]);
  });

  it("returns an empty transcript for no chunks", () => {
    const result = aggregator.aggregate("session-1", []);
    expect(result).toEqual({
      sessionId: "session-1",
      fullTranscript: "",
      totalChunks: 0,
      completedChunks: 0,
      failedChunks: 0,
      confidenceScore: 0,
      totalDurationSeconds: 0,
      segments: [],
    });
  });
});
