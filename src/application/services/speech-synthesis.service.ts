import type { ISpeechProvider } from "../../domain/interfaces/ispeech.provider";
import { ValidationError } from "../../domain/errors/app.errors";
import type { ContentAddressedCache } from "./content-addressed.cache";

export const TTS_CACHE_NAMESPACE = "tts";

const CONTENT_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  opus: "audio/opus",
  aac: "audio/aac",
  flac: "audio/flac",
  wav: "audio/wav",
  pcm: "audio/pcm",
};

export interface SpeechSynthesisOptions {
  defaultVoice: string;
  defaultFormat: string;
  maxTextLength: number;
}

export interface SynthesizeSpeechParams {
  text: string;
  voice?: string;
  format?: string;
}

export interface SynthesizedSpeech {
  key: string;
  voice: string;
  format: string;
  contentType: string;
  sizeBytes: number;
  durationSeconds?: number;
  cached: boolean;
  hitCount: number;
  createdAt: Date;
}

export function contentTypeForFormat(format: string): string {
  return CONTENT_TYPES[format] ?? "application/octet-stream";
}

// ~150 words per minute of speech
export function estimateSpeechDuration(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.max(1, (words / 150) * 60);
}

/**
 * Text-to-speech backed by the content-addressed cache: identical
 * (text, voice, format) requests reuse the stored audio.
 */
export class SpeechSynthesisService {
  constructor(
    private readonly cache: ContentAddressedCache,
    private readonly provider: ISpeechProvider,
    private readonly options: SpeechSynthesisOptions
  ) {}

  async synthesize(params: SynthesizeSpeechParams): Promise<SynthesizedSpeech> {
    const text = (params.text ?? "").trim();
    const voice = params.voice ?? this.options.defaultVoice;
    const format = params.format ?? this.options.defaultFormat;

    const errors: string[] = [];
    if (!text) {
      errors.push("text is required");
    } else if (text.length > this.options.maxTextLength) {
      errors.push(`text exceeds ${this.options.maxTextLength} characters`);
    }
    if (!this.provider.voices.includes(voice)) {
      errors.push(`voice must be one of: ${this.provider.voices.join(", ")}`);
    }
    if (!this.provider.formats.includes(format)) {
      errors.push(`format must be one of: ${this.provider.formats.join(", ")}`);
    }
    if (errors.length > 0) {
      throw new ValidationError("Invalid speech request", errors);
    }

    const { entry, wasCached } = await this.cache.getOrCompute(
      TTS_CACHE_NAMESPACE,
      { text, voice, format },
      async () => {
        console.log(`[SpeechSynthesis] Generating ${format} audio (${text.length} chars, voice ${voice})`);
        const data = await this.provider.synthesize({ text, voice, format });
        return {
          data,
          contentType: contentTypeForFormat(format),
          durationSeconds: estimateSpeechDuration(text),
          metadata: { voice, format, textLength: text.length },
        };
      }
    );

    return {
      key: entry.key,
      voice,
      format,
      contentType: entry.payloadRef.contentType,
      sizeBytes: entry.payloadRef.sizeBytes,
      durationSeconds: entry.payloadRef.durationSeconds,
      cached: wasCached,
      hitCount: entry.hitCount,
      createdAt: entry.createdAt,
    };
  }

  async getAudio(key: string): Promise<{ data: Buffer; contentType: string } | null> {
    if (!/^[a-f0-9]{64}$/.test(key)) {
      throw new ValidationError("Invalid audio key");
    }
    const artifact = await this.cache.readArtifact(key);
    if (!artifact) {
      return null;
    }
    return { data: artifact.data, contentType: artifact.entry.payloadRef.contentType };
  }
}
