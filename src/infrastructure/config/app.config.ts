/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";

export type RepositoryDriver = "mongodb" | "memory";
export type BlobStorageDriver = "local" | "s3" | "memory";

export interface AppConfig {
  // Server
  port: number;

  // OpenAI
  openaiApiKey: string;
  openai: {
    transcriptionModel: string;
    speechModel: string;
    speechTimeoutMs: number;
  };

  storage: {
    repositories: RepositoryDriver;
    blobs: BlobStorageDriver;
    uploadDir: string; // root for the local blob driver
  };

  // AWS S3
  aws: {
    accessKeyId?: string;
    secretAccessKey?: string;
    region: string;
    s3Bucket?: string;
    s3Endpoint?: string; // For S3-compatible services
    s3ForcePathStyle?: boolean; // Use path-style addressing
  };

  // MongoDB
  mongodb: {
    uri: string;
    dbName: string;
  };

  upload: {
    maxFileSizeBytes: number;
    allowedExtensions: string[];
    defaultOverlapSeconds: number;
  };

  transcription: {
    concurrency: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    timeoutMs: number;
    processingLockTimeoutMs: number;
    recoveryPendingAgeMs: number;
    defaultLanguage: string;
  };

  aggregation: {
    wordsPerSecond: number;
    charsPerWord: number;
    maxOverlapChars: number;
  };

  cache: {
    maxAgeHours: number;
    aggressiveMaxAgeHours: number; // applied when the cache is over maxSizeBytes
    maxSizeBytes: number;
  };

  tts: {
    defaultVoice: string;
    defaultFormat: string;
    maxTextLength: number;
  };

  notifications: {
    webhookUrls: string[];
    timeoutMs: number;
  };

  retention: {
    maxSessionAgeDays: number;
  };
}

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFrom(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
}

function listFrom(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((candidate) => candidate === value);
  if (value && !match) {
    throw new Error(`Invalid value "${value}"; expected one of ${allowed.join(", ")}`);
  }
  return match ?? fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Validate required environment variables
  const openaiApiKey = env.OPENAI_API_KEY;
  if (!openaiApiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required");
  }

  const blobs = oneOf(env.BLOB_STORAGE_DRIVER, ["local", "s3", "memory"] as const, "local");
  if (blobs === "s3" && !env.S3_BUCKET) {
    throw new Error("S3_BUCKET environment variable is required when BLOB_STORAGE_DRIVER=s3");
  }

  return {
    port: intFrom(env.PORT, 3000),

    openaiApiKey,
    openai: {
      transcriptionModel: env.OPENAI_TRANSCRIPTION_MODEL || "whisper-1",
      speechModel: env.OPENAI_SPEECH_MODEL || "tts-1",
      speechTimeoutMs: intFrom(env.OPENAI_SPEECH_TIMEOUT_MS, 60_000),
    },

    storage: {
      repositories: oneOf(env.STORAGE_DRIVER, ["mongodb", "memory"] as const, "mongodb"),
      blobs,
      uploadDir: env.UPLOAD_DIR || "./uploads",
    },

    aws: {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      region: (env.AWS_REGION || env.AWS_DEFAULT_REGION || "us-east-1").trim(),
      s3Bucket: env.S3_BUCKET,
      s3Endpoint: env.S3_ENDPOINT,
      s3ForcePathStyle: env.S3_FORCE_PATH_STYLE === "true",
    },

    mongodb: {
      uri: env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: env.MONGODB_DB_NAME || "interview-transcription",
    },

    upload: {
      maxFileSizeBytes: intFrom(env.MAX_FILE_SIZE_BYTES, 100 * 1024 * 1024),
      allowedExtensions: listFrom(env.ALLOWED_EXTENSIONS, ["webm", "mp3", "wav", "m4a", "ogg"]),
      defaultOverlapSeconds: floatFrom(env.DEFAULT_OVERLAP_SECONDS, 2),
    },

    transcription: {
      concurrency: intFrom(env.TRANSCRIPTION_CONCURRENCY, 4),
      maxAttempts: intFrom(env.TRANSCRIPTION_MAX_ATTEMPTS, 3),
      backoffBaseMs: intFrom(env.TRANSCRIPTION_BACKOFF_BASE_MS, 1_000),
      backoffMaxMs: intFrom(env.TRANSCRIPTION_BACKOFF_MAX_MS, 30_000),
      timeoutMs: intFrom(env.TRANSCRIPTION_TIMEOUT_MS, 120_000),
      processingLockTimeoutMs: intFrom(env.TRANSCRIPTION_LOCK_TIMEOUT_MS, 10 * 60 * 1000),
      recoveryPendingAgeMs: intFrom(env.TRANSCRIPTION_RECOVERY_PENDING_AGE_MS, 60_000),
      defaultLanguage: env.TRANSCRIPTION_DEFAULT_LANGUAGE || "en",
    },

    aggregation: {
      wordsPerSecond: floatFrom(env.OVERLAP_WORDS_PER_SECOND, 2.5),
      charsPerWord: floatFrom(env.OVERLAP_CHARS_PER_WORD, 6),
      maxOverlapChars: intFrom(env.OVERLAP_MAX_CHARS, 50),
    },

    cache: {
      maxAgeHours: floatFrom(env.CACHE_MAX_AGE_HOURS, 24),
      aggressiveMaxAgeHours: floatFrom(env.CACHE_AGGRESSIVE_MAX_AGE_HOURS, 12),
      maxSizeBytes: intFrom(env.CACHE_MAX_SIZE_BYTES, 100 * 1024 * 1024),
    },

    tts: {
      defaultVoice: env.TTS_DEFAULT_VOICE || "alloy",
      defaultFormat: env.TTS_DEFAULT_FORMAT || "mp3",
      maxTextLength: intFrom(env.TTS_MAX_TEXT_LENGTH, 4096),
    },

    notifications: {
      webhookUrls: listFrom(env.NOTIFY_WEBHOOK_URLS, []),
      timeoutMs: intFrom(env.NOTIFY_TIMEOUT_MS, 5_000),
    },

    retention: {
      maxSessionAgeDays: intFrom(env.MAX_SESSION_AGE_DAYS, 30),
    },
  };
}

export function loadConfig(): AppConfig {
  // Load environment variables from .env file
  dotenv.config();
  return getConfig(process.env);
}
