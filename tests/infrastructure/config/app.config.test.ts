import { describe, expect, it } from "vitest";
import { getConfig } from "../../../src/infrastructure/config/app.config";

describe("getConfig", () => {
  it("applies defaults", () => {
    const config = getConfig({ OPENAI_API_KEY: "test-key" });

    expect(config.port).toBe(3000);
    expect(config.storage).toEqual({ repositories: "mongodb", blobs: "local", uploadDir: "./uploads" });
    expect(config.upload.allowedExtensions).toEqual(["webm", "mp3", "wav", "m4a", "ogg"]);
    expect(config.transcription).toMatchObject({ concurrency: 4, maxAttempts: 3, backoffBaseMs: 1000 });
    expect(config.aggregation).toEqual({ wordsPerSecond: 2.5, charsPerWord: 6, maxOverlapChars: 50 });
    expect(config.cache).toEqual({ maxAgeHours: 24, aggressiveMaxAgeHours: 12, maxSizeBytes: 100 * 1024 * 1024 });
    expect(config.notifications.webhookUrls).toEqual([]);
  });

  it("reads overrides from the environment", () => {
    const config = getConfig({
      OPENAI_API_KEY: "test-key",
      PORT: "8080",
      STORAGE_DRIVER: "memory",
      BLOB_STORAGE_DRIVER: "s3",
      S3_BUCKET: "chunks",
      S3_FORCE_PATH_STYLE: "true",
      ALLOWED_EXTENSIONS: "webm, wav",
      NOTIFY_WEBHOOK_URLS: "http://hooks.test/a,http://hooks.test/b",
      TRANSCRIPTION_CONCURRENCY: "not-a-number",
    });

    expect(config.port).toBe(8080);
    expect(config.storage.repositories).toBe("memory");
    expect(config.storage.blobs).toBe("s3");
    expect(config.aws.s3Bucket).toBe("chunks");
    expect(config.aws.s3ForcePathStyle).toBe(true);
    expect(config.upload.allowedExtensions).toEqual(["webm", "wav"]);
    expect(config.notifications.webhookUrls).toEqual(["http://hooks.test/a", "http://hooks.test/b"]);
    expect(config.transcription.concurrency).toBe(4);
  });

  it("requires the API key and a bucket for s3", () => {
    expect(() => getConfig({})).toThrow("OPENAI_API_KEY environment variable is required");
    expect(() => getConfig({ OPENAI_API_KEY: "test-key", BLOB_STORAGE_DRIVER: "s3" })).toThrow(
      "S3_BUCKET environment variable is required when BLOB_STORAGE_DRIVER=s3"
    );
  });

  it("rejects unknown drivers", () => {
    expect(() => getConfig({ OPENAI_API_KEY: "test-key", STORAGE_DRIVER: "postgres" })).toThrow(
      'Invalid value "postgres"; expected one of mongodb, memory'
    );
  });
});
