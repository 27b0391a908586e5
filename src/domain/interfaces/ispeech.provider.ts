export interface SpeechRequest {
  text: string;
  voice: string;
  format: string;
}

export interface ISpeechProvider {
  readonly voices: readonly string[];
  readonly formats: readonly string[];
  synthesize(request: SpeechRequest): Promise<Buffer>;
}
