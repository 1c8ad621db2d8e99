import type { IncomingHttpHeaders } from "node:http";

import { isRecordLike } from "../api/http";
import type { WebhookEventStore } from "../db/store";
import { InvalidEventError } from "../errors";
import { formatLine, type Logger } from "../logger";
import { createMetrics, type MirrorMetrics, type WebhookRejection } from "../metrics";
import type { OrchestrationOutcome, SyncOrchestrator } from "../sync/orchestrator";
import { parseStarEvent } from "./payloadParser";
import { verifySignature } from "./signature";

export interface WebhookRequest {
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export interface WebhookResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export interface WebhookReceiver {
  receive: (request: WebhookRequest) => Promise<WebhookResponse>;
}

export interface WebhookReceiverDependencies {
  orchestrator: Pick<SyncOrchestrator, "handle">;
  events: WebhookEventStore;
  logger: Logger;
  metrics?: MirrorMetrics;
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first.length === 0 ? undefined : first;
}

export function outcomeToResponse(outcome: OrchestrationOutcome): WebhookResponse {
  switch (outcome.kind) {
    case "accepted":
      return { statusCode: 202, body: { status: "accepted", recordId: outcome.recordId } };
    case "already_synced":
      return {
        statusCode: 200,
        body: {
          status: "already_synced",
          recordId: outcome.recordId,
          syncStatus: outcome.status,
          ...(outcome.errorMessage === null ? {} : { reason: outcome.errorMessage })
        }
      };
    case "ignored":
      return { statusCode: 200, body: { status: "ignored", reason: outcome.reason } };
    case "rejected_invalid":
      return { statusCode: 400, body: { status: "rejected_invalid", reason: outcome.reason } };
    case "unavailable":
      return { statusCode: 503, body: { status: "unavailable", reason: outcome.reason } };
  }
}

function outcomeRecordId(outcome: OrchestrationOutcome): number | null {
  return outcome.kind === "accepted" || outcome.kind === "already_synced"
    ? outcome.recordId
    : null;
}

function outcomeError(outcome: OrchestrationOutcome): string | null {
  return outcome.kind === "rejected_invalid" ? outcome.reason : null;
}

export function createWebhookReceiver(
  secret: string,
  dependencies: WebhookReceiverDependencies
): WebhookReceiver {
  const { orchestrator, events, logger } = dependencies;
  const metrics = dependencies.metrics ?? createMetrics();

  const count = (
    eventType: string,
    status: OrchestrationOutcome["kind"] | WebhookRejection
  ): void => {
    metrics.webhookRequests.inc({ event_type: eventType, status });
  };

  const evaluate = async (
    eventType: string,
    deliveryId: string,
    payload: unknown
  ): Promise<OrchestrationOutcome> => {
    // Pings and other subscriptions carry no repository to parse.
    if (eventType !== "watch" && eventType !== "star") {
      return { kind: "ignored", reason: `unsupported event type ${eventType}` };
    }

    try {
      return await orchestrator.handle(parseStarEvent(eventType, deliveryId, payload));
    } catch (error) {
      if (error instanceof InvalidEventError) {
        return { kind: "rejected_invalid", reason: error.message };
      }

      throw error;
    }
  };

  return {
    async receive(request: WebhookRequest): Promise<WebhookResponse> {
      const eventType = header(request.headers, "x-github-event");
      const deliveryId = header(request.headers, "x-github-delivery");
      if (eventType === undefined || deliveryId === undefined) {
        count(eventType ?? "unknown", "bad_request");
        return {
          statusCode: 400,
          body: { error: "Missing X-GitHub-Event or X-GitHub-Delivery header" }
        };
      }

      const signature = header(request.headers, "x-hub-signature-256");
      if (signature === undefined || !verifySignature(secret, request.body, signature)) {
        logger.error(formatLine("webhook signature verification failed", { deliveryId, eventType }));
        count(eventType, "invalid_signature");
        return { statusCode: 401, body: { error: "Invalid signature" } };
      }

      let payload: unknown;
      try {
        payload = JSON.parse(request.body.toString("utf8"));
      } catch (error) {
        logger.error(formatLine("webhook payload is not JSON", { deliveryId }), error);
        count(eventType, "bad_request");
        return { statusCode: 400, body: { error: "Invalid JSON payload" } };
      }

      try {
        const action = isRecordLike(payload) && typeof payload.action === "string"
          ? payload.action
          : null;
        const delivery = await events.recordDelivery({
          deliveryId,
          eventType,
          action,
          payload,
          signature
        });
        logger.info(
          formatLine("webhook received", {
            deliveryId,
            eventType,
            action,
            redelivery: delivery.duplicate
          })
        );

        const outcome = await evaluate(eventType, deliveryId, payload);
        if (outcome.kind !== "unavailable") {
          await events.markProcessed(deliveryId, {
            syncRecordId: outcomeRecordId(outcome),
            error: outcomeError(outcome)
          });
        }

        count(eventType, outcome.kind);
        return outcomeToResponse(outcome);
      } catch (error) {
        logger.error(formatLine("webhook processing failed", { deliveryId }), error);
        count(eventType, "error");
        return { statusCode: 500, body: { error: "Internal server error" } };
      }
    }
  };
}
