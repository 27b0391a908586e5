import type { SynthesizedSpeech } from "../../application/services/speech-synthesis.service";

export interface SynthesizeSpeechRequest {
  text: string;
  voice?: string;
  format?: string;
}

export interface SynthesizeSpeechResponse {
  key: string;
  audioUrl: string;
  voice: string;
  format: string;
  contentType: string;
  sizeBytes: number;
  durationSeconds?: number;
  cached: boolean;
  hitCount: number;
  createdAt: Date;
}

export function parseSynthesizeSpeechRequest(body: unknown): SynthesizeSpeechRequest {
  const fields: Record<string, unknown> = typeof body === "object" && body !== null ? { ...body } : {};
  return {
    text: typeof fields.text === "string" ? fields.text : "",
    voice: typeof fields.voice === "string" ? fields.voice : undefined,
    format: typeof fields.format === "string" ? fields.format : undefined,
  };
}

export function toSynthesizeSpeechResponse(speech: SynthesizedSpeech): SynthesizeSpeechResponse {
  return {
    ...speech,
    audioUrl: `/api/tts/files/${speech.key}`,
  };
}
