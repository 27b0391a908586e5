import axios from "axios";
import { NotificationDeliveryError, errorMessage } from "../../domain/errors/app.errors";
import type { IEventNotifier, SessionEvent, SessionEventHandler } from "../../domain/interfaces/ievent.notifier";

export type WebhookPoster = (url: string, body: unknown, timeoutMs: number) => Promise<void>;

export const postWebhook: WebhookPoster = async (url, body, timeoutMs) => {
  try {
    await axios.post(url, body, { timeout: timeoutMs, headers: { "Content-Type": "application/json" } });
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      throw new Error(`${error.code ?? "HTTP_ERROR"}${status ? ` (status ${status})` : ""}: ${error.message}`);
    }
    throw error;
  }
};

export interface EventNotifierOptions {
  webhookUrls: string[];
  timeoutMs: number;
}

/**
 * Delivers session events to in-process subscribers and webhook endpoints.
 * Each delivery is tried once; failures are logged and never reach the
 * code that raised the event.
 */
export class EventNotifier implements IEventNotifier {
  private handlers = new Set<SessionEventHandler>();
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly options: EventNotifierOptions,
    private readonly post: WebhookPoster = postWebhook
  ) {}

  subscribe(handler: SessionEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  notify(event: SessionEvent): void {
    const delivery = this.deliver(event).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /** Waits for every delivery started so far. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async deliver(event: SessionEvent): Promise<void> {
    const targets: Array<{ target: string; send: () => Promise<void> }> = [
      ...[...this.handlers].map((handler, index) => ({
        target: `subscriber#${index}`,
        send: async () => handler(event),
      })),
      ...this.options.webhookUrls.map((url) => ({
        target: url,
        send: () => this.post(url, toWebhookBody(event), this.options.timeoutMs),
      })),
    ];

    await Promise.all(
      targets.map(async ({ target, send }) => {
        try {
          await send();
        } catch (error) {
          const failure = new NotificationDeliveryError(
            `Failed to deliver ${event.type} for session ${event.sessionId}: ${errorMessage(error)}`,
            target
          );
          console.warn(`[EventNotifier] ${failure.message} (target ${failure.target})`);
        }
      })
    );
  }
}

export function toWebhookBody(event: SessionEvent): Record<string, unknown> {
  return {
    type: event.type,
    sessionId: event.sessionId,
    occurredAt: event.occurredAt.toISOString(),
    payload: event.payload,
  };
}
