import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  TranscriptionWorkerPool,
  backoffDelay,
  type TranscriptionWorkerPoolOptions,
} from "../../../src/application/workers/transcription.worker-pool";
import type { Chunk } from "../../../src/domain/entities/chunk";
import type {
  ITranscriptionProvider,
  TranscriptionOutcome,
} from "../../../src/domain/interfaces/itranscription.provider";
import { InMemoryChunkRepository } from "../../../src/infrastructure/database/in-memory/in.memory.chunk.repository";
import { InMemorySessionRepository } from "../../../src/infrastructure/database/in-memory/in.memory.session.repository";
import { InMemoryBlobStorage } from "../../../src/infrastructure/storage/in.memory.blob.storage";
import { FakeTranscriptionProvider, makeChunk, success } from "../../helpers/fakes";

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(1, 1000, 30_000)).toBe(1000);
    expect(backoffDelay(3, 1000, 30_000)).toBe(4000);
    expect(backoffDelay(10, 1000, 30_000)).toBe(30_000);
  });
});

describe("TranscriptionWorkerPool", () => {
  let chunks: InMemoryChunkRepository;
  let sessions: InMemorySessionRepository;
  let blobs: InMemoryBlobStorage;
  let provider: FakeTranscriptionProvider;
  let sleeps: number[];
  let settled: Chunk[];

  const options = (overrides: Partial<TranscriptionWorkerPoolOptions> = {}): TranscriptionWorkerPoolOptions => ({
    concurrency: 2,
    maxAttempts: 3,
    backoffBaseMs: 1000,
    backoffMaxMs: 30_000,
    timeoutMs: 5_000,
    processingLockTimeoutMs: 60_000,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });

  const createPool = (
    overrides: Partial<TranscriptionWorkerPoolOptions> = {},
    transcriber: ITranscriptionProvider = provider
  ) =>
    new TranscriptionWorkerPool(chunks, sessions, blobs, transcriber, options(overrides), async (chunk) => {
      settled.push(chunk);
    });

  const storeChunk = async (sequenceIndex: number, spokenText: string, overrides: Partial<Chunk> = {}) => {
    const chunk = makeChunk({ sequenceIndex, transcriptionStatus: "pending", transcriptionAttempts: 0, ...overrides });
    await blobs.put(chunk.blobKey, Buffer.from(spokenText), chunk.mimeType);
    await chunks.swap(chunk);
    return chunk;
  };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    chunks = new InMemoryChunkRepository();
    sessions = new InMemorySessionRepository();
    blobs = new InMemoryBlobStorage();
    provider = new FakeTranscriptionProvider();
    sleeps = [];
    settled = [];
    await sessions.ensureExists("session-1");
  });

  it("retries retryable failures with backoff and stores the transcript", async () => {
    await storeChunk(0, "some words");
    provider.script(
      "some words",
      { ok: false, kind: "rate_limit", message: "slow down" },
      { ok: false, kind: "transient", message: "bad gateway" },
      success("some words", 0.8)
    );

    const result = await createPool().processChunk("chunk-0");

    expect(result).toMatchObject({
      transcriptionStatus: "completed",
      transcriptText: "some words",
      confidenceScore: 0.8,
      durationSeconds: 10,
      language: "en",
      transcriptionAttempts: 3,
    });
    expect(result?.lastError).toBeUndefined();
    expect(sleeps).toEqual([1000, 2000]);
    expect(provider.calls).toHaveLength(3);
    expect(settled.map((c) => c.id)).toEqual(["chunk-0"]);

    const session = await sessions.findById("session-1");
    expect(session?.chunkCount).toBe(1);
    expect(session?.totalDurationSeconds).toBe(10);
  });

  it("does not retry a rejected request", async () => {
    await storeChunk(0, "garbled");
    provider.script("garbled", { ok: false, kind: "rejected", message: "invalid file format" });

    const result = await createPool().processChunk("chunk-0");

    expect(result?.transcriptionStatus).toBe("failed");
    expect(result?.transcriptionAttempts).toBe(1);
    expect(result?.lastError).toBe("rejected: invalid file format");
    expect(provider.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("marks the chunk failed once attempts run out", async () => {
    await storeChunk(0, "flaky");
    const down: TranscriptionOutcome = { ok: false, kind: "transient", message: "connection reset" };
    provider.script("flaky", down, down, down);

    const result = await createPool().processChunk("chunk-0");

    expect(result?.transcriptionStatus).toBe("failed");
    expect(result?.uploadStatus).toBe("uploaded");
    expect(result?.transcriptionAttempts).toBe(3);
    expect(result?.lastError).toBe("transient: connection reset");
    expect(sleeps).toEqual([1000, 2000]);
    expect(settled).toHaveLength(1);
  });

  it("fails the upload when the audio blob is missing", async () => {
    await chunks.swap(makeChunk({ sequenceIndex: 0, transcriptionStatus: "pending", transcriptionAttempts: 0 }));

    const result = await createPool().processChunk("chunk-0");

    expect(result?.uploadStatus).toBe("failed");
    expect(result?.transcriptionStatus).toBe("failed");
    expect(result?.lastError).toBe("Chunk audio not found in storage");
    expect(provider.calls).toHaveLength(0);
  });

  it("treats a provider that never answers as timed out", async () => {
    await storeChunk(0, "silence");
    const hanging: ITranscriptionProvider = {
      transcribe: () => new Promise<TranscriptionOutcome>(() => undefined),
    };

    const result = await createPool({ maxAttempts: 1, timeoutMs: 20 }, hanging).processChunk("chunk-0");

    expect(result?.transcriptionStatus).toBe("failed");
    expect(result?.lastError).toBe("timeout: No response within 20ms");
  });

  it("treats a thrown provider error as transient", async () => {
    await storeChunk(0, "boom");
    const throwing: ITranscriptionProvider = {
      transcribe: async () => {
        throw new Error("socket hang up");
      },
    };

    const result = await createPool({ maxAttempts: 2 }, throwing).processChunk("chunk-0");

    expect(result?.lastError).toBe("transient: socket hang up");
    expect(result?.transcriptionAttempts).toBe(2);
    expect(sleeps).toEqual([1000]);
  });

  it("skips chunks it cannot claim", async () => {
    await storeChunk(0, "done", { transcriptionStatus: "completed" });
    await storeChunk(1, "busy", { transcriptionStatus: "processing", processingStartedAt: new Date() });

    const pool = createPool();

    expect(await pool.processChunk("chunk-0")).toBeNull();
    expect(await pool.processChunk("chunk-1")).toBeNull();
    expect(await pool.processChunk("missing")).toBeNull();
    expect(provider.calls).toHaveLength(0);
    expect(settled).toEqual([]);
  });

  it("takes over a processing claim older than the lock timeout", async () => {
    await storeChunk(0, "abandoned", {
      transcriptionStatus: "processing",
      processingStartedAt: new Date(Date.now() - 120_000),
    });

    const result = await createPool().processChunk("chunk-0");

    expect(result?.transcriptionStatus).toBe("completed");
    expect(result?.transcriptText).toBe("abandoned");
  });

  it("queues each chunk once and drains within the concurrency limit", async () => {
    await storeChunk(0, "zero");
    await storeChunk(1, "one", { id: "chunk-1" });
    await storeChunk(2, "two", { id: "chunk-2" });
    const pool = createPool({ concurrency: 1 });

    expect(pool.enqueue("chunk-0")).toBe(true);
    expect(pool.enqueue("chunk-0")).toBe(false);
    expect(pool.enqueue("chunk-1")).toBe(true);
    expect(pool.enqueue("chunk-2")).toBe(true);
    expect(pool.activeCount).toBe(1);
    expect(pool.pendingCount).toBe(2);

    await pool.onIdle();

    expect(settled.map((c) => c.transcriptText)).toEqual(["zero", "one", "two"]);
    expect(pool.activeCount).toBe(0);
    expect(pool.pendingCount).toBe(0);
  });

  it("refuses new work after stop", async () => {
    await storeChunk(0, "late");
    const pool = createPool();

    await pool.stop();

    expect(pool.enqueue("chunk-0")).toBe(false);
    expect((await chunks.findById("chunk-0"))?.transcriptionStatus).toBe("pending");
  });
});
