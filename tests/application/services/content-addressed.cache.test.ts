import { beforeEach, describe, expect, it, vi } from "vitest";
import { ContentAddressedCache, type CacheArtifact } from "../../../src/application/services/content-addressed.cache";
import { InMemoryCacheEntryRepository } from "../../../src/infrastructure/database/in-memory/in.memory.cache-entry.repository";
import { InMemoryBlobStorage } from "../../../src/infrastructure/storage/in.memory.blob.storage";

const HOUR = 60 * 60 * 1000;

function artifact(content: string): CacheArtifact {
  return { data: Buffer.from(content), contentType: "audio/mpeg", durationSeconds: 2 };
}

describe("ContentAddressedCache", () => {
  let repository: InMemoryCacheEntryRepository;
  let blobs: InMemoryBlobStorage;
  let cache: ContentAddressedCache;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    repository = new InMemoryCacheEntryRepository();
    blobs = new InMemoryBlobStorage();
    cache = new ContentAddressedCache(repository, blobs, {
      maxAgeMs: 24 * HOUR,
      aggressiveMaxAgeMs: 12 * HOUR,
      maxSizeBytes: 1000,
    });
  });

  it("computes once and serves later calls from the cache", async () => {
    const compute = vi.fn(async () => artifact("0123456789"));

    const first = await cache.getOrCompute("tts", { text: "hi", voice: "alloy" }, compute);
    const second = await cache.getOrCompute("tts", { voice: "alloy", text: "hi" }, compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(first.wasCached).toBe(false);
    expect(first.entry.hitCount).toBe(0);
    expect(second.wasCached).toBe(true);
    expect(second.entry.hitCount).toBe(1);
    expect(second.entry.key).toBe(first.entry.key);
    expect(first.entry.payloadRef).toMatchObject({ contentType: "audio/mpeg", sizeBytes: 10, durationSeconds: 2 });
    expect(first.entry.payloadRef.blobKey).toMatch(new RegExp(`^cache/tts/${first.entry.key}_[a-f0-9-]{8}$`));
  });

  it("shares one computation between concurrent callers", async () => {
    const compute = vi.fn(async () => artifact("abc"));

    const [a, b] = await Promise.all([
      cache.getOrCompute("tts", { text: "same" }, compute),
      cache.getOrCompute("tts", { text: "same" }, compute),
    ]);

    expect(compute).toHaveBeenCalledTimes(1);
    expect([a.wasCached, b.wasCached].sort()).toEqual([false, true]);
    expect(blobs.keys()).toHaveLength(1);
  });

  it("recomputes when the stored blob has gone missing", async () => {
    const compute = vi.fn(async () => artifact("abc"));
    const first = await cache.getOrCompute("tts", { text: "lost" }, compute);
    await blobs.delete(first.entry.payloadRef.blobKey);

    const second = await cache.getOrCompute("tts", { text: "lost" }, compute);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(second.wasCached).toBe(false);
    expect(second.entry.hitCount).toBe(0);
    expect(await blobs.exists(second.entry.payloadRef.blobKey)).toBe(true);
  });

  it("does not store anything when the computation fails", async () => {
    await expect(
      cache.getOrCompute("tts", { text: "broken" }, async () => {
        throw new Error("provider down");
      })
    ).rejects.toThrow("provider down");

    expect(blobs.keys()).toEqual([]);
    expect((await cache.getInfo()).totalEntries).toBe(0);
  });

  it("reads an artifact without counting a hit", async () => {
    const { entry } = await cache.getOrCompute("tts", { text: "read" }, async () => artifact("payload"));

    const read = await cache.readArtifact(entry.key);

    expect(read?.data.toString()).toBe("payload");
    expect(read?.entry.hitCount).toBe(0);
    expect(await cache.readArtifact("f".repeat(64))).toBeNull();
  });

  it("drops entries older than the maximum age", async () => {
    await cache.getOrCompute("tts", { text: "old" }, async () => artifact("0123456789"));

    const kept = await cache.cleanup(new Date(Date.now() + 13 * HOUR));
    expect(kept).toEqual({ deletedEntries: 0, deletedBytes: 0, aggressive: false });

    const removed = await cache.cleanup(new Date(Date.now() + 25 * HOUR));
    expect(removed).toEqual({ deletedEntries: 1, deletedBytes: 10, aggressive: false });
    expect(blobs.keys()).toEqual([]);
  });

  it("falls back to the shorter age when over the size limit", async () => {
    const small = new ContentAddressedCache(repository, blobs, {
      maxAgeMs: 24 * HOUR,
      aggressiveMaxAgeMs: 12 * HOUR,
      maxSizeBytes: 15,
    });
    await small.getOrCompute("tts", { text: "one" }, async () => artifact("0123456789"));
    await small.getOrCompute("tts", { text: "two" }, async () => artifact("0123456789"));

    const result = await small.cleanup(new Date(Date.now() + 13 * HOUR));

    expect(result).toEqual({ deletedEntries: 2, deletedBytes: 20, aggressive: true });
    expect((await small.getInfo()).totalBytes).toBe(0);
  });
});
