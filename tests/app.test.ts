import type { Server } from "http";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { createTestHarness, type TestHarness } from "./helpers/fakes";

function field(body: unknown, name: string): unknown {
  return typeof body === "object" && body !== null ? Object.entries(body).find(([key]) => key === name)?.[1] : undefined;
}

describe("HTTP API", () => {
  let harness: TestHarness;
  let server: Server;
  let baseUrl: string;

  const postJson = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  const uploadChunk = (sessionId: string, fields: Record<string, string>, spokenText?: string, filename = "chunk.webm") => {
    const form = new FormData();
    for (const [name, value] of Object.entries(fields)) {
      form.append(name, value);
    }
    if (spokenText !== undefined) {
      form.append("file", new Blob([spokenText], { type: "audio/webm" }), filename);
    }
    return fetch(`${baseUrl}/api/sessions/${sessionId}/chunks`, { method: "POST", body: form });
  };

  beforeAll(async () => {
    harness = createTestHarness();
    const app = createApp(harness.container, harness.config.upload.maxFileSizeBytes);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Test server did not bind a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await harness.container.workerPool.stop();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", service: "interview-transcription-service" });
  });

  it("creates a session once", async () => {
    const first = await postJson("/api/sessions", { sessionId: "http-create", totalChunksExpected: 2 });
    const second = await postJson("/api/sessions", { sessionId: "http-create" });

    expect(first.status).toBe(201);
    expect(await first.json()).toMatchObject({ sessionId: "http-create", status: "open", totalChunksExpected: 2 });
    expect(second.status).toBe(200);
  });

  it("rejects a malformed session request", async () => {
    const response = await postJson("/api/sessions", { sessionId: "http-bad", totalChunksExpected: "two" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid session",
      code: "VALIDATION_ERROR",
      details: ["totalChunksExpected must be a number"],
    });
  });

  it("rejects uploads with missing or unsupported files", async () => {
    const unsupported = await uploadChunk("http-upload", { sequenceIndex: "0" }, "words", "notes.txt");
    expect(unsupported.status).toBe(400);
    expect(await unsupported.json()).toEqual({
      error: "Invalid chunk upload",
      code: "VALIDATION_ERROR",
      details: ["Unsupported file type .txt; allowed: webm, mp3, wav, m4a, ogg"],
    });

    const missingFile = await uploadChunk("http-upload", { sequenceIndex: "0" });
    expect(missingFile.status).toBe(400);
    expect(field(await missingFile.json(), "error")).toBe("No file uploaded");

    const missingIndex = await uploadChunk("http-upload", {}, "words");
    expect(missingIndex.status).toBe(400);
    expect(field(await missingIndex.json(), "details")).toEqual(["sequenceIndex is required"]);
  });

  it("transcribes and merges a two chunk session", async () => {
    const first = await uploadChunk(
      "http-flow",
      { sequenceIndex: "0", totalChunksExpected: "2", overlapSeconds: "2" },
      "hello there"
    );
    const second = await uploadChunk(
      "http-flow",
      { sequenceIndex: "1", totalChunksExpected: "2", overlapSeconds: "2" },
      "there, how are you"
    );

    expect(first.status).toBe(201);
    expect(await first.json()).toMatchObject({ sequenceIndex: 0, isFinalChunk: false, message: "Chunk uploaded" });
    expect(await second.json()).toMatchObject({ sequenceIndex: 1, isFinalChunk: true, replaced: false });

    await harness.container.workerPool.onIdle();
    await harness.container.notifier.flush();

    const transcript = await fetch(`${baseUrl}/api/sessions/http-flow/transcript`);
    expect(transcript.status).toBe(200);
    expect(await transcript.json()).toMatchObject({
      sessionId: "http-flow",
      fullTranscript: "hello there, how are you",
      totalChunks: 2,
      completedChunks: 2,
      failedChunks: 0,
    });

    const session = await fetch(`${baseUrl}/api/sessions/http-flow`);
    expect(await session.json()).toMatchObject({ status: "completed", chunkCount: 2, missingIndices: [] });

    const gaps = await fetch(`${baseUrl}/api/sessions/http-flow/gaps`);
    expect(await gaps.json()).toEqual({ sessionId: "http-flow", gaps: [] });

    const finalize = await fetch(`${baseUrl}/api/sessions/http-flow/finalize`, { method: "POST" });
    expect(finalize.status).toBe(409);
    expect(field(await finalize.json(), "code")).toBe("CONFLICT");
  });

  it("returns 404 for unknown sessions", async () => {
    const session = await fetch(`${baseUrl}/api/sessions/http-nobody`);
    expect(session.status).toBe(404);
    expect(await session.json()).toEqual({ error: "Session http-nobody not found", code: "NOT_FOUND" });

    const transcript = await fetch(`${baseUrl}/api/sessions/http-nobody/transcript`);
    expect(transcript.status).toBe(404);
    expect(field(await transcript.json(), "error")).toBe("No chunks found for session http-nobody");
  });

  it("reports storage statistics", async () => {
    const response = await fetch(`${baseUrl}/api/stats/storage`);

    expect(response.status).toBe(200);
    expect(field(await response.json(), "cache")).toMatchObject({ maxSizeBytes: 100 * 1024 * 1024 });
  });

  it("serves synthesized speech from the cache", async () => {
    const first = await postJson("/api/tts", { text: "Why do you want this role?" });
    const second = await postJson("/api/tts", { text: "Why do you want this role?" });

    expect(first.status).toBe(201);
    const created = await first.json();
    expect(created).toMatchObject({ voice: "alloy", format: "mp3", cached: false, hitCount: 0 });
    expect(second.status).toBe(200);
    expect(await second.json()).toMatchObject({ cached: true, hitCount: 1 });

    const audioUrl = field(created, "audioUrl");
    expect(audioUrl).toMatch(/^\/api\/tts\/files\/[a-f0-9]{64}$/);
    const audio = await fetch(`${baseUrl}${String(audioUrl)}`);
    expect(audio.status).toBe(200);
    expect(audio.headers.get("content-type")).toBe("audio/mpeg");
    expect(await audio.text()).toBe("alloy:mp3:Why do you want this role?");

    const invalid = await fetch(`${baseUrl}/api/tts/files/not-a-key`);
    expect(invalid.status).toBe(400);
    expect(harness.speechProvider.calls).toHaveLength(1);
  });

  it("rejects an invalid speech request", async () => {
    const response = await postJson("/api/tts", { text: "" });

    expect(response.status).toBe(400);
    expect(field(await response.json(), "details")).toEqual(["text is required"]);
  });
});
