import OpenAI from "openai";
import { TransientProviderError, ValidationError, errorMessage } from "../../domain/errors/app.errors";
import type { ISpeechProvider, SpeechRequest } from "../../domain/interfaces/ispeech.provider";
import { classifyOpenAIError } from "./openai.errors";

const VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;
const FORMATS = ["mp3", "opus", "aac", "flac", "wav", "pcm"] as const;

type Voice = (typeof VOICES)[number];
type Format = (typeof FORMATS)[number];

function isVoice(value: string): value is Voice {
  return VOICES.some((voice) => voice === value);
}

function isFormat(value: string): value is Format {
  return FORMATS.some((format) => format === value);
}

export class OpenAISpeechProvider implements ISpeechProvider {
  readonly voices: readonly string[] = VOICES;
  readonly formats: readonly string[] = FORMATS;
  private client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = "tts-1",
    private readonly timeoutMs: number = 60_000
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async synthesize(request: SpeechRequest): Promise<Buffer> {
    const { voice, format } = request;
    if (!isVoice(voice) || !isFormat(format)) {
      throw new ValidationError(`Unsupported voice or format: ${voice}/${format}`);
    }

    try {
      const response = await this.client.audio.speech.create(
        { model: this.model, voice, input: request.text, response_format: format },
        { timeout: this.timeoutMs }
      );
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      const kind = classifyOpenAIError(error);
      console.error(`[OpenAISpeechProvider] Speech generation failed (${kind}):`, errorMessage(error));
      if (kind === "rejected") {
        throw new ValidationError(`Speech request rejected: ${errorMessage(error)}`);
      }
      throw new TransientProviderError(`Speech provider unavailable: ${errorMessage(error)}`, kind);
    }
  }
}
