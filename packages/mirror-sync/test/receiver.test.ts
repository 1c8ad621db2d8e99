import { describe, expect, it, vi } from "vitest";

import { createMemoryStores } from "../src/db/memoryStore";
import { createMetrics, type MirrorMetrics } from "../src/metrics";
import { createSyncOrchestrator, type OrchestrationOutcome } from "../src/sync/orchestrator";
import type { StarEvent } from "../src/types";
import { createWebhookReceiver, outcomeToResponse } from "../src/webhook/receiver";
import { signPayload } from "../src/webhook/signature";
import { START, captureLogger, createFakeHosts } from "./helpers";

const SECRET = "test-secret";

function watchBody(overrides: Record<string, unknown> = {}): Buffer {
  return Buffer.from(
    JSON.stringify({
      action: "started",
      repository: {
        id: 42,
        name: "widget",
        full_name: "acme/widget",
        owner: { login: "acme" },
        clone_url: "https://github.test/acme/widget.git",
        default_branch: "main",
        private: false,
        size: 2048
      },
      ...overrides
    })
  );
}

function signedRequest(body: Buffer, eventType = "watch", deliveryId = "delivery-1") {
  return {
    headers: {
      "x-github-event": eventType,
      "x-github-delivery": deliveryId,
      "x-hub-signature-256": signPayload(SECRET, body)
    },
    body
  };
}

async function webhookCounts(metrics: MirrorMetrics): Promise<Array<[string, string, number]>> {
  const { values } = await metrics.webhookRequests.get();
  return values.map(({ labels, value }): [string, string, number] => [
    String(labels.event_type),
    String(labels.status),
    value
  ]);
}

function setup() {
  const stores = createMemoryStores({ now: () => START });
  const hosts = createFakeHosts();
  const { logger, lines } = captureLogger();
  const metrics = createMetrics();
  const queued: number[] = [];
  const orchestrator = createSyncOrchestrator(
    {
      conflictPolicy: "reuse",
      destinationPrefix: "",
      transferTimeoutMs: 1_800_000,
      largeRepoThresholdKb: 1_048_576,
      largeRepoTransferTimeoutMs: 7_200_000,
      retry: { maxRetries: 3, baseDelayMs: 4000, maxDelayMs: 60_000 },
      secrets: [SECRET]
    },
    {
      store: stores.syncRecords,
      ...hosts,
      scheduler: {
        enqueue: (recordId) => {
          queued.push(recordId);
        }
      },
      logger,
      now: () => START
    }
  );
  const receiver = createWebhookReceiver(SECRET, {
    orchestrator,
    events: stores.webhookEvents,
    logger,
    metrics
  });

  return { stores, lines, queued, receiver, metrics };
}

function stubbedReceiver(handle: (event: StarEvent) => Promise<OrchestrationOutcome>) {
  const stores = createMemoryStores({ now: () => START });
  const { logger, lines } = captureLogger();
  const metrics = createMetrics();
  const receiver = createWebhookReceiver(SECRET, {
    orchestrator: { handle },
    events: stores.webhookEvents,
    logger,
    metrics
  });

  return { stores, lines, receiver, metrics };
}

describe("outcomeToResponse", () => {
  it("maps each outcome to its status code", () => {
    expect(outcomeToResponse({ kind: "accepted", recordId: 3 })).toEqual({
      statusCode: 202,
      body: { status: "accepted", recordId: 3 }
    });
    expect(
      outcomeToResponse({
        kind: "already_synced",
        recordId: 3,
        status: "permanent_failure",
        errorMessage: "GitHub resource not found: acme/widget"
      })
    ).toEqual({
      statusCode: 200,
      body: {
        status: "already_synced",
        recordId: 3,
        syncStatus: "permanent_failure",
        reason: "GitHub resource not found: acme/widget"
      }
    });
    expect(outcomeToResponse({ kind: "ignored", reason: "unstar is not supported" }).statusCode).toBe(200);
    expect(outcomeToResponse({ kind: "rejected_invalid", reason: "bad" }).statusCode).toBe(400);
    expect(outcomeToResponse({ kind: "unavailable", reason: "down" }).statusCode).toBe(503);
  });
});

describe("createWebhookReceiver", () => {
  it("requires the event and delivery headers", async () => {
    const { receiver } = setup();

    const response = await receiver.receive({
      headers: { "x-github-event": "watch" },
      body: watchBody()
    });

    expect(response).toEqual({
      statusCode: 400,
      body: { error: "Missing X-GitHub-Event or X-GitHub-Delivery header" }
    });
  });

  it("rejects a body signed with another secret before storing it", async () => {
    const { receiver, stores, lines } = setup();
    const body = watchBody();

    const response = await receiver.receive({
      headers: {
        "x-github-event": "watch",
        "x-github-delivery": "delivery-1",
        "x-hub-signature-256": signPayload("other-secret", body)
      },
      body
    });

    expect(response).toEqual({ statusCode: 401, body: { error: "Invalid signature" } });
    expect(stores.deliveries()).toEqual([]);
    expect(lines).toContain(
      "error: webhook signature verification failed (deliveryId=delivery-1, eventType=watch)"
    );
  });

  it("rejects a missing signature", async () => {
    const { receiver } = setup();

    const response = await receiver.receive({
      headers: { "x-github-event": "watch", "x-github-delivery": "delivery-1" },
      body: watchBody()
    });

    expect(response.statusCode).toBe(401);
  });

  it("rejects a signed body that is not JSON", async () => {
    const { receiver } = setup();

    const response = await receiver.receive(signedRequest(Buffer.from("{not json")));

    expect(response).toEqual({ statusCode: 400, body: { error: "Invalid JSON payload" } });
  });

  it("accepts a new star and records the delivery", async () => {
    const { receiver, stores, queued, lines } = setup();

    const response = await receiver.receive(signedRequest(watchBody()));

    expect(response).toEqual({ statusCode: 202, body: { status: "accepted", recordId: 1 } });
    expect(queued).toEqual([1]);
    expect(stores.deliveries()).toMatchObject([
      {
        deliveryId: "delivery-1",
        eventType: "watch",
        action: "started",
        processed: true,
        syncRecordId: 1,
        processingError: null
      }
    ]);
    expect(lines).toContain(
      "webhook received (deliveryId=delivery-1, eventType=watch, action=started, redelivery=false)"
    );
  });

  it("answers a redelivery without scheduling more work", async () => {
    const { receiver, queued, lines } = setup();
    await receiver.receive(signedRequest(watchBody()));

    const response = await receiver.receive(signedRequest(watchBody()));

    expect(response).toEqual({
      statusCode: 200,
      body: { status: "already_synced", recordId: 1, syncStatus: "pending" }
    });
    expect(queued).toEqual([1]);
    expect(lines).toContain(
      "webhook received (deliveryId=delivery-1, eventType=watch, action=started, redelivery=true)"
    );
  });

  it("ignores event types other than stars", async () => {
    const { receiver, stores } = setup();

    const response = await receiver.receive(
      signedRequest(Buffer.from(JSON.stringify({ zen: "Keep it logically awesome." })), "ping", "delivery-9")
    );

    expect(response).toEqual({
      statusCode: 200,
      body: { status: "ignored", reason: "unsupported event type ping" }
    });
    expect(stores.deliveries()).toMatchObject([
      { deliveryId: "delivery-9", action: null, processed: true, syncRecordId: null }
    ]);
  });

  it("ignores un-star events", async () => {
    const { receiver } = setup();

    const response = await receiver.receive(
      signedRequest(watchBody({ action: "deleted" }), "star")
    );

    expect(response).toEqual({
      statusCode: 200,
      body: { status: "ignored", reason: "unstar is not supported" }
    });
  });

  it("rejects a star payload without a repository", async () => {
    const { receiver, stores } = setup();

    const response = await receiver.receive(signedRequest(watchBody({ repository: null })));

    expect(response).toEqual({
      statusCode: 400,
      body: {
        status: "rejected_invalid",
        reason: "Invalid star event field 'repository': expected an object"
      }
    });
    expect(stores.deliveries()).toMatchObject([
      {
        processed: true,
        processingError: "Invalid star event field 'repository': expected an object"
      }
    ]);
  });

  it("leaves the delivery unprocessed when the store is unavailable", async () => {
    const { receiver, stores } = stubbedReceiver(async () => ({
      kind: "unavailable",
      reason: "connection terminated"
    }));

    const response = await receiver.receive(signedRequest(watchBody()));

    expect(response).toEqual({
      statusCode: 503,
      body: { status: "unavailable", reason: "connection terminated" }
    });
    expect(stores.deliveries()).toMatchObject([{ processed: false }]);
  });

  it("answers 500 when handling throws", async () => {
    const handle = vi.fn<[StarEvent], Promise<OrchestrationOutcome>>(async () => {
      throw new Error("boom");
    });
    const { receiver, lines, metrics } = stubbedReceiver(handle);

    const response = await receiver.receive(signedRequest(watchBody()));

    expect(response).toEqual({ statusCode: 500, body: { error: "Internal server error" } });
    expect(handle).toHaveBeenCalledOnce();
    expect(lines).toContain("error: webhook processing failed (deliveryId=delivery-1)");
    expect(await webhookCounts(metrics)).toEqual([["watch", "error", 1]]);
  });

  it("counts requests by event type and outcome", async () => {
    const { receiver, metrics } = setup();
    const body = watchBody();

    await receiver.receive(signedRequest(body));
    await receiver.receive(signedRequest(body, "watch", "delivery-2"));
    await receiver.receive(signedRequest(Buffer.from("{}"), "ping", "delivery-3"));
    await receiver.receive({
      headers: {
        "x-github-event": "watch",
        "x-github-delivery": "delivery-4",
        "x-hub-signature-256": signPayload("other-secret", body)
      },
      body
    });
    await receiver.receive({ headers: { "x-github-event": "watch" }, body });
    await receiver.receive({ headers: {}, body });

    const counts = await webhookCounts(metrics);
    expect(counts).toHaveLength(6);
    expect(counts).toEqual(
      expect.arrayContaining([
        ["watch", "accepted", 1],
        ["watch", "already_synced", 1],
        ["ping", "ignored", 1],
        ["watch", "invalid_signature", 1],
        ["watch", "bad_request", 1],
        ["unknown", "bad_request", 1]
      ])
    );
  });
});
