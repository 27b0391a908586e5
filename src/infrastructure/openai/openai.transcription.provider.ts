import OpenAI, { toFile } from "openai";
import type {
  ITranscriptionProvider,
  TranscribedSegment,
  TranscriptionOutcome,
  TranscriptionRequest,
  TranscriptionResult,
} from "../../domain/interfaces/itranscription.provider";
import { clampConfidence } from "../../domain/utils/confidence";
import { errorMessage } from "../../domain/errors/app.errors";
import { classifyOpenAIError } from "./openai.errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Confidence of a Whisper segment: exp(avg_logprob) is the mean token
 * probability; without it, fall back to 1 - no_speech_prob.
 */
export function segmentConfidence(segment: Record<string, unknown>): number {
  if (typeof segment.avg_logprob === "number") {
    return clampConfidence(Math.exp(segment.avg_logprob));
  }
  if (typeof segment.no_speech_prob === "number") {
    return clampConfidence(1 - segment.no_speech_prob);
  }
  return 0;
}

/**
 * Reads a `verbose_json` transcription response.
 */
export function parseVerboseTranscription(response: unknown, fallbackLanguage: string): TranscriptionResult {
  if (!isRecord(response) || typeof response.text !== "string") {
    throw new Error("Unexpected transcription response shape");
  }

  const rawSegments = Array.isArray(response.segments) ? response.segments : [];
  const segments: TranscribedSegment[] = rawSegments.filter(isRecord).map((segment) => ({
    start: numberOr(segment.start, 0),
    end: numberOr(segment.end, 0),
    text: typeof segment.text === "string" ? segment.text.trim() : "",
    confidence: segmentConfidence(segment),
  }));

  const lastEnd = segments.length > 0 ? segments[segments.length - 1].end : 0;

  return {
    text: response.text.trim(),
    segments,
    language: typeof response.language === "string" && response.language ? response.language : fallbackLanguage,
    durationSeconds: numberOr(response.duration, lastEnd),
  };
}

// Magic bytes for the formats chunks arrive in; the client's MIME type is not always right
export function detectAudioMimeType(audio: Buffer, fallback: string): string {
  if (audio.length < 12) {
    return fallback;
  }
  if (audio[0] === 0x1a && audio[1] === 0x45 && audio[2] === 0xdf && audio[3] === 0xa3) {
    return "audio/webm";
  }
  if ((audio[0] === 0xff && (audio[1] & 0xe0) === 0xe0) || audio.subarray(0, 3).toString("ascii") === "ID3") {
    return "audio/mpeg";
  }
  if (audio.subarray(0, 4).toString("ascii") === "OggS") {
    return "audio/ogg";
  }
  if (audio.subarray(0, 4).toString("ascii") === "RIFF" && audio.subarray(8, 12).toString("ascii") === "WAVE") {
    return "audio/wav";
  }
  if (audio.subarray(4, 8).toString("ascii") === "ftyp") {
    return "audio/mp4";
  }
  return fallback;
}

/** Language hint for the request; empty or missing hints let Whisper detect it. */
export function languageParam(language: string | null | undefined): { language?: string } {
  return typeof language === "string" && language ? { language } : {};
}

export class OpenAITranscriptionProvider implements ITranscriptionProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = "whisper-1",
    private readonly defaultLanguage: string = "en"
  ) {
    // Retries are owned by the worker pool
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async transcribe(request: TranscriptionRequest, options: { timeoutMs: number }): Promise<TranscriptionOutcome> {
    const mimeType = detectAudioMimeType(request.audio, request.mimeType);
    console.log(
      `[OpenAITranscriptionProvider] Transcribing ${request.filename} (${request.audio.length} bytes, ${mimeType})`
    );

    try {
      const file = await toFile(request.audio, request.filename, { type: mimeType });
      const response: unknown = await this.client.audio.transcriptions.create(
        {
          model: this.model,
          file,
          response_format: "verbose_json",
          timestamp_granularities: ["segment"],
          ...languageParam(request.language),
        },
        { timeout: options.timeoutMs, maxRetries: 0 }
      );

      return { ok: true, result: parseVerboseTranscription(response, request.language || this.defaultLanguage) };
    } catch (error) {
      const kind = classifyOpenAIError(error);
      console.error(`[OpenAITranscriptionProvider] Transcription failed (${kind}):`, errorMessage(error));
      return { ok: false, kind, message: errorMessage(error) };
    }
  }
}
