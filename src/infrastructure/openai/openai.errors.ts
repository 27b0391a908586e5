import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  RateLimitError,
} from "openai";
import type { TranscriptionFailureKind } from "../../domain/interfaces/itranscription.provider";

/**
 * Maps an error thrown by the OpenAI SDK to whether, and how, the call may be retried.
 */
export function classifyOpenAIError(error: unknown): TranscriptionFailureKind {
  // Timeout extends APIConnectionError, so it is checked first
  if (error instanceof APIConnectionTimeoutError) {
    return "timeout";
  }
  if (error instanceof RateLimitError) {
    return "rate_limit";
  }
  if (error instanceof APIConnectionError) {
    return "transient";
  }
  if (error instanceof APIError) {
    if (error.status === undefined || error.status >= 500 || error.status === 408) {
      return "transient";
    }
    return "rejected";
  }
  return "transient";
}
