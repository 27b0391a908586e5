import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalBlobStorage } from "../../../src/infrastructure/storage/local.blob.storage";

describe("LocalBlobStorage", () => {
  let root: string;
  let storage: LocalBlobStorage;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "blob-storage-"));
    storage = new LocalBlobStorage(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes, reads and deletes blobs", async () => {
    await storage.put("sessions/a/chunk_0000.webm", Buffer.from("audio"), "audio/webm");

    expect((await storage.get("sessions/a/chunk_0000.webm"))?.toString()).toBe("audio");
    expect(await storage.exists("sessions/a/chunk_0000.webm")).toBe(true);

    await storage.delete("sessions/a/chunk_0000.webm");
    await storage.delete("sessions/a/chunk_0000.webm");

    expect(await storage.get("sessions/a/chunk_0000.webm")).toBeNull();
    expect(await storage.exists("sessions/a/chunk_0000.webm")).toBe(false);
  });

  it("deletes every blob under a prefix", async () => {
    await storage.put("sessions/a/chunk_0000.webm", Buffer.from("0"), "audio/webm");
    await storage.put("sessions/a/chunk_0001.webm", Buffer.from("1"), "audio/webm");
    await storage.put("sessions/b/chunk_0000.webm", Buffer.from("2"), "audio/webm");

    expect(await storage.deletePrefix("sessions/a/")).toBe(2);
    expect(await storage.deletePrefix("sessions/missing/")).toBe(0);
    expect(await storage.exists("sessions/b/chunk_0000.webm")).toBe(true);
  });

  it("refuses keys outside the root", async () => {
    await expect(storage.put("../escape.webm", Buffer.from("x"), "audio/webm")).rejects.toThrow(
      "Blob key escapes storage root: ../escape.webm"
    );
  });
});
