import type { Server } from "http";
import { createApp } from "./app";
import { createContainer, type Container, type Infrastructure } from "./container";
import type { IBlobStorage } from "./domain/interfaces/iblob.storage";
import { loadConfig, type AppConfig } from "./infrastructure/config/app.config";
import { MongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { InMemoryCacheEntryRepository } from "./infrastructure/database/in-memory/in.memory.cache-entry.repository";
import { InMemoryChunkRepository } from "./infrastructure/database/in-memory/in.memory.chunk.repository";
import { InMemorySessionRepository } from "./infrastructure/database/in-memory/in.memory.session.repository";
import { InMemorySessionTranscriptRepository } from "./infrastructure/database/in-memory/in.memory.session-transcript.repository";
import { CacheEntryRepository } from "./infrastructure/database/repositories/cache-entry.repository";
import { ChunkRepository } from "./infrastructure/database/repositories/chunk.repository";
import { SessionRepository } from "./infrastructure/database/repositories/session.repository";
import { SessionTranscriptRepository } from "./infrastructure/database/repositories/session-transcript.repository";
import { OpenAISpeechProvider } from "./infrastructure/openai/openai.speech.provider";
import { OpenAITranscriptionProvider } from "./infrastructure/openai/openai.transcription.provider";
import { InMemoryBlobStorage } from "./infrastructure/storage/in.memory.blob.storage";
import { LocalBlobStorage } from "./infrastructure/storage/local.blob.storage";
import { S3BlobStorage } from "./infrastructure/storage/s3.blob.storage";

function createBlobStorage(config: AppConfig): IBlobStorage {
  switch (config.storage.blobs) {
    case "s3":
      return new S3BlobStorage({
        bucket: config.aws.s3Bucket ?? "",
        region: config.aws.region,
        credentials: config.aws.accessKeyId
          ? {
              accessKeyId: config.aws.accessKeyId,
              secretAccessKey: config.aws.secretAccessKey || "",
            }
          : undefined,
        endpoint: config.aws.s3Endpoint,
        forcePathStyle: config.aws.s3ForcePathStyle,
      });
    case "memory":
      return new InMemoryBlobStorage();
    case "local":
      return new LocalBlobStorage(config.storage.uploadDir);
  }
}

async function createInfrastructure(config: AppConfig, mongo: MongoDBConnection | null): Promise<Infrastructure> {
  const providers = {
    blobStorage: createBlobStorage(config),
    transcriptionProvider: new OpenAITranscriptionProvider(
      config.openaiApiKey,
      config.openai.transcriptionModel,
      config.transcription.defaultLanguage
    ),
    speechProvider: new OpenAISpeechProvider(config.openaiApiKey, config.openai.speechModel, config.openai.speechTimeoutMs),
  };

  if (!mongo) {
    console.log("Using in-memory repositories; data will not survive a restart");
    return {
      ...providers,
      sessionRepository: new InMemorySessionRepository(),
      chunkRepository: new InMemoryChunkRepository(),
      cacheEntryRepository: new InMemoryCacheEntryRepository(),
      sessionTranscriptRepository: new InMemorySessionTranscriptRepository(),
    };
  }

  const db = await mongo.connect();
  return {
    ...providers,
    sessionRepository: new SessionRepository(db),
    chunkRepository: new ChunkRepository(db),
    cacheEntryRepository: new CacheEntryRepository(db),
    sessionTranscriptRepository: new SessionTranscriptRepository(db),
  };
}

let shutdown: (() => Promise<void>) | null = null;

async function main() {
  try {
    const config = loadConfig();
    const mongo =
      config.storage.repositories === "mongodb" ? new MongoDBConnection(config.mongodb.uri, config.mongodb.dbName) : null;

    const infra = await createInfrastructure(config, mongo);
    const container: Container = createContainer(config, infra);
    const app = createApp(container, config.upload.maxFileSizeBytes);

    // Initialize and start cron jobs
    const crons = Object.values(container.crons);
    crons.forEach((cronJob) => cronJob.start());

    // Pick up chunks left pending by a previous run
    await container.crons.pendingChunkRecovery.run();

    // Start server
    const server: Server = app.listen(config.port, () => {
      console.log(`Interview transcription service running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`API endpoints: http://localhost:${config.port}/api/sessions`);
    });

    shutdown = async () => {
      crons.forEach((cronJob) => cronJob.stop());
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await container.workerPool.stop();
      await container.notifier.flush();
      await mongo?.close();
    };
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

// Handle graceful shutdown
async function handleSignal(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  try {
    await shutdown?.();
    process.exit(0);
  } catch (error) {
    console.error("Error during shutdown:", error);
    process.exit(1);
  }
}

process.on("SIGTERM", () => void handleSignal("SIGTERM"));
process.on("SIGINT", () => void handleSignal("SIGINT"));

void main();
