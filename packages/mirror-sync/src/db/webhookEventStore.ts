import type { NewWebhookEvent, WebhookEventRecord } from "../types";
import type { QueryRunner, RecordDeliveryResult, WebhookEventStore } from "./store";

export type WebhookEventRow = {
  id: number;
  delivery_id: string;
  event_type: string;
  action: string | null;
  payload: unknown;
  signature: string;
  processed: boolean;
  processing_error: string | null;
  received_at: Date;
  processed_at: Date | null;
  sync_record_id: number | null;
};

const INSERT_DELIVERY_SQL = `
INSERT INTO webhook_events (delivery_id, event_type, action, payload, signature)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (delivery_id) DO NOTHING
RETURNING *;
`;

const SELECT_BY_DELIVERY_SQL = `
SELECT *
FROM webhook_events
WHERE delivery_id = $1;
`;

const MARK_PROCESSED_SQL = `
UPDATE webhook_events
SET processed = TRUE, processed_at = NOW(), sync_record_id = $2, processing_error = $3
WHERE delivery_id = $1
RETURNING *;
`;

export function rowToWebhookEvent(row: WebhookEventRow): WebhookEventRecord {
  return {
    id: row.id,
    deliveryId: row.delivery_id,
    eventType: row.event_type,
    action: row.action,
    payload: row.payload,
    signature: row.signature,
    processed: row.processed,
    processingError: row.processing_error,
    receivedAt: row.received_at.toISOString(),
    processedAt: row.processed_at === null ? null : row.processed_at.toISOString(),
    syncRecordId: row.sync_record_id
  };
}

/** A redelivery keeps the first stored copy and reports `duplicate`. */
export async function recordWebhookDelivery(
  runner: QueryRunner<WebhookEventRow>,
  input: NewWebhookEvent
): Promise<RecordDeliveryResult> {
  const inserted = await runner.query(INSERT_DELIVERY_SQL, [
    input.deliveryId,
    input.eventType,
    input.action,
    JSON.stringify(input.payload),
    input.signature
  ]);

  const insertedRow = inserted.rows[0];
  if (insertedRow !== undefined) {
    return { event: rowToWebhookEvent(insertedRow), duplicate: false };
  }

  const existing = await runner.query(SELECT_BY_DELIVERY_SQL, [input.deliveryId]);
  const existingRow = existing.rows[0];
  if (existingRow === undefined) {
    throw new Error(`webhook delivery ${input.deliveryId} conflicted but could not be read back`);
  }

  return { event: rowToWebhookEvent(existingRow), duplicate: true };
}

export async function markWebhookProcessed(
  runner: QueryRunner<WebhookEventRow>,
  deliveryId: string,
  result: { syncRecordId: number | null; error: string | null }
): Promise<WebhookEventRecord | null> {
  const updated = await runner.query(MARK_PROCESSED_SQL, [
    deliveryId,
    result.syncRecordId,
    result.error
  ]);

  const row = updated.rows[0];
  return row === undefined ? null : rowToWebhookEvent(row);
}

export function createPgWebhookEventStore(
  runner: QueryRunner<WebhookEventRow>
): WebhookEventStore {
  return {
    recordDelivery: (input) => recordWebhookDelivery(runner, input),
    markProcessed: (deliveryId, result) => markWebhookProcessed(runner, deliveryId, result)
  };
}
