import { ContentAddressedCache } from "./application/services/content-addressed.cache";
import { SessionLifecycleService } from "./application/services/session-lifecycle.service";
import { SpeechSynthesisService } from "./application/services/speech-synthesis.service";
import { TranscriptAggregator } from "./application/services/transcript.aggregator";
import { AggregateSessionUseCase } from "./application/use-cases/aggregate-session.use-case";
import { CleanupExpiredSessionsUseCase } from "./application/use-cases/cleanup-expired-sessions.use-case";
import { CreateSessionUseCase } from "./application/use-cases/create-session.use-case";
import { FinalizeSessionUseCase } from "./application/use-cases/finalize-session.use-case";
import { FindGapsUseCase } from "./application/use-cases/find-gaps.use-case";
import { GetSessionUseCase } from "./application/use-cases/get-session.use-case";
import { GetStorageStatisticsUseCase } from "./application/use-cases/get-storage-statistics.use-case";
import { ResumePendingChunksUseCase } from "./application/use-cases/resume-pending-chunks.use-case";
import { UploadChunkUseCase } from "./application/use-cases/upload-chunk.use-case";
import { TranscriptionWorkerPool } from "./application/workers/transcription.worker-pool";
import type { IBlobStorage } from "./domain/interfaces/iblob.storage";
import type { ICacheEntryRepository } from "./domain/interfaces/icache-entry.repository";
import type { IChunkRepository } from "./domain/interfaces/ichunk.repository";
import type { ISessionRepository } from "./domain/interfaces/isession.repository";
import type { ISessionTranscriptRepository } from "./domain/interfaces/isession-transcript.repository";
import type { ISpeechProvider } from "./domain/interfaces/ispeech.provider";
import type { ITranscriptionProvider } from "./domain/interfaces/itranscription.provider";
import type { AppConfig } from "./infrastructure/config/app.config";
import { CacheCleanupCron } from "./infrastructure/cron/cache-cleanup.cron";
import { PendingChunkRecoveryCron } from "./infrastructure/cron/pending-chunk-recovery.cron";
import { SessionRetentionCron } from "./infrastructure/cron/session-retention.cron";
import { EventNotifier, type WebhookPoster } from "./infrastructure/events/event.notifier";
import { SessionController } from "./presentation/controllers/session.controller";
import { TtsController } from "./presentation/controllers/tts.controller";

export interface Infrastructure {
  sessionRepository: ISessionRepository;
  chunkRepository: IChunkRepository;
  cacheEntryRepository: ICacheEntryRepository;
  sessionTranscriptRepository: ISessionTranscriptRepository;
  blobStorage: IBlobStorage;
  transcriptionProvider: ITranscriptionProvider;
  speechProvider: ISpeechProvider;
}

export interface ContainerOverrides {
  sleep?: (ms: number) => Promise<void>;
  postWebhook?: WebhookPoster;
}

export type Container = ReturnType<typeof createContainer>;

/**
 * Wires services, use cases, controllers and crons over the given infrastructure.
 */
export function createContainer(config: AppConfig, infra: Infrastructure, overrides: ContainerOverrides = {}) {
  const hour = 60 * 60 * 1000;

  const notifier = new EventNotifier(config.notifications, overrides.postWebhook);
  const cache = new ContentAddressedCache(infra.cacheEntryRepository, infra.blobStorage, {
    maxAgeMs: config.cache.maxAgeHours * hour,
    aggressiveMaxAgeMs: config.cache.aggressiveMaxAgeHours * hour,
    maxSizeBytes: config.cache.maxSizeBytes,
  });
  const aggregator = new TranscriptAggregator(config.aggregation);

  const lifecycle = new SessionLifecycleService(
    infra.sessionRepository,
    infra.chunkRepository,
    infra.sessionTranscriptRepository,
    aggregator,
    notifier,
    cache
  );

  const workerPool = new TranscriptionWorkerPool(
    infra.chunkRepository,
    infra.sessionRepository,
    infra.blobStorage,
    infra.transcriptionProvider,
    {
      concurrency: config.transcription.concurrency,
      maxAttempts: config.transcription.maxAttempts,
      backoffBaseMs: config.transcription.backoffBaseMs,
      backoffMaxMs: config.transcription.backoffMaxMs,
      timeoutMs: config.transcription.timeoutMs,
      processingLockTimeoutMs: config.transcription.processingLockTimeoutMs,
      sleep: overrides.sleep,
    },
    async (chunk) => {
      await lifecycle.checkCompletion(chunk.sessionId);
    }
  );

  const speechSynthesisService = new SpeechSynthesisService(cache, infra.speechProvider, config.tts);

  // Use cases
  const createSessionUseCase = new CreateSessionUseCase(infra.sessionRepository);
  const uploadChunkUseCase = new UploadChunkUseCase(
    infra.sessionRepository,
    infra.chunkRepository,
    infra.blobStorage,
    workerPool,
    lifecycle,
    notifier,
    {
      allowedExtensions: config.upload.allowedExtensions,
      maxFileSizeBytes: config.upload.maxFileSizeBytes,
      defaultOverlapSeconds: config.upload.defaultOverlapSeconds,
    }
  );
  const getSessionUseCase = new GetSessionUseCase(infra.sessionRepository, infra.chunkRepository);
  const findGapsUseCase = new FindGapsUseCase(infra.chunkRepository);
  const aggregateSessionUseCase = new AggregateSessionUseCase(
    infra.sessionRepository,
    infra.chunkRepository,
    infra.sessionTranscriptRepository,
    aggregator
  );
  const finalizeSessionUseCase = new FinalizeSessionUseCase(lifecycle);
  const getStorageStatisticsUseCase = new GetStorageStatisticsUseCase(
    infra.sessionRepository,
    infra.chunkRepository,
    cache
  );
  const resumePendingChunksUseCase = new ResumePendingChunksUseCase(infra.chunkRepository, workerPool);
  const cleanupExpiredSessionsUseCase = new CleanupExpiredSessionsUseCase(
    infra.sessionRepository,
    infra.chunkRepository,
    infra.sessionTranscriptRepository,
    infra.blobStorage
  );

  // Controllers
  const sessionController = new SessionController(
    createSessionUseCase,
    uploadChunkUseCase,
    getSessionUseCase,
    findGapsUseCase,
    aggregateSessionUseCase,
    finalizeSessionUseCase,
    getStorageStatisticsUseCase
  );
  const ttsController = new TtsController(speechSynthesisService, cache);

  // Crons
  const crons = {
    pendingChunkRecovery: new PendingChunkRecoveryCron(resumePendingChunksUseCase, {
      pendingAgeMs: config.transcription.recoveryPendingAgeMs,
      processingLockTimeoutMs: config.transcription.processingLockTimeoutMs,
    }),
    cacheCleanup: new CacheCleanupCron(cache),
    sessionRetention: new SessionRetentionCron(cleanupExpiredSessionsUseCase, config.retention.maxSessionAgeDays),
  };

  return {
    ...infra,
    notifier,
    cache,
    aggregator,
    lifecycle,
    workerPool,
    speechSynthesisService,
    createSessionUseCase,
    uploadChunkUseCase,
    getSessionUseCase,
    findGapsUseCase,
    aggregateSessionUseCase,
    finalizeSessionUseCase,
    getStorageStatisticsUseCase,
    resumePendingChunksUseCase,
    cleanupExpiredSessionsUseCase,
    sessionController,
    ttsController,
    crons,
  };
}
