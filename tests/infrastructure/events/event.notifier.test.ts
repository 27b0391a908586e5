import { beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { SessionEvent } from "../../../src/domain/interfaces/ievent.notifier";
import { EventNotifier, toWebhookBody, type WebhookPoster } from "../../../src/infrastructure/events/event.notifier";

const event: SessionEvent = {
  type: "session.failed",
  sessionId: "interview-1",
  occurredAt: new Date("2024-05-01T10:00:00.000Z"),
  payload: { reason: "No chunk could be transcribed", totalChunks: 2 },
};

describe("EventNotifier", () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("delivers to subscribers and webhooks", async () => {
    const post = vi.fn<WebhookPoster>(async () => undefined);
    const notifier = new EventNotifier({ webhookUrls: ["http://hooks.test/a"], timeoutMs: 250 }, post);
    const received: SessionEvent[] = [];
    notifier.subscribe((e) => {
      received.push(e);
    });

    notifier.notify(event);
    await notifier.flush();

    expect(received).toEqual([event]);
    expect(post).toHaveBeenCalledWith(
      "http://hooks.test/a",
      {
        type: "session.failed",
        sessionId: "interview-1",
        occurredAt: "2024-05-01T10:00:00.000Z",
        payload: { reason: "No chunk could be transcribed", totalChunks: 2 },
      },
      250
    );
  });

  it("keeps delivering when one target fails", async () => {
    const post = vi.fn<WebhookPoster>(async () => {
      throw new Error("ECONNREFUSED");
    });
    const notifier = new EventNotifier({ webhookUrls: ["http://hooks.test/down"], timeoutMs: 250 }, post);
    const received: string[] = [];
    notifier.subscribe(() => {
      throw new Error("subscriber crashed");
    });
    notifier.subscribe(async (e) => {
      received.push(e.type);
    });

    expect(() => notifier.notify(event)).not.toThrow();
    await notifier.flush();

    expect(received).toEqual(["session.failed"]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      "[EventNotifier] Failed to deliver session.failed for session interview-1: ECONNREFUSED (target http://hooks.test/down)"
    );
  });

  it("stops delivering after unsubscribe", async () => {
    const notifier = new EventNotifier({ webhookUrls: [], timeoutMs: 250 });
    const handler = vi.fn();
    const unsubscribe = notifier.subscribe(handler);

    unsubscribe();
    notifier.notify(event);
    await notifier.flush();

    expect(handler).not.toHaveBeenCalled();
  });

  it("serializes dates in webhook bodies", () => {
    expect(toWebhookBody(event).occurredAt).toBe("2024-05-01T10:00:00.000Z");
  });
});
