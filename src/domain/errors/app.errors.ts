/**
 * Base class for failures the service reports to its callers.
 * `statusCode` is the HTTP status the presentation layer answers with.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: string[] = []) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export class SessionFailedError extends AppError {
  constructor(sessionId: string, reason?: string) {
    super(
      `Session ${sessionId} failed${reason ? `: ${reason}` : ""}`,
      422,
      "SESSION_FAILED"
    );
  }
}

export class TransientProviderError extends AppError {
  constructor(message: string, public readonly kind: string) {
    super(message, 502, "PROVIDER_UNAVAILABLE");
  }
}

// Never surfaces to a caller; the notifier logs it and moves on
export class NotificationDeliveryError extends AppError {
  constructor(message: string, public readonly target: string) {
    super(message, 500, "NOTIFICATION_DELIVERY_FAILED");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
