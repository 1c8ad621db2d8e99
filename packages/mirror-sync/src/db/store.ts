import type {
  NewSyncAttemptLog,
  NewSyncRecord,
  NewWebhookEvent,
  SyncAttemptLog,
  SyncRecord,
  SyncRecordPatch,
  SyncStatus,
  WebhookEventRecord
} from "../types";

/**
 * Persistence seen by the orchestrator. Implementations must make
 * `createPending` and `transition` atomic: `createPending` returns null when
 * the source URL already has a record, `transition` returns null when the
 * stored status no longer equals `from`.
 */
export interface SyncRecordStore {
  findBySourceUrl: (sourceUrl: string) => Promise<SyncRecord | null>;
  findById: (id: number) => Promise<SyncRecord | null>;
  createPending: (input: NewSyncRecord) => Promise<SyncRecord | null>;
  transition: (
    id: number,
    from: SyncStatus,
    to: SyncStatus,
    patch?: SyncRecordPatch
  ) => Promise<SyncRecord | null>;
  touchLastSynced: (id: number, at: string) => Promise<SyncRecord | null>;
  appendAttemptLog: (entry: NewSyncAttemptLog) => Promise<SyncAttemptLog>;
  listAttemptLogs: (syncRecordId: number, limit: number) => Promise<SyncAttemptLog[]>;
  listDueRetries: (now: string, limit: number) => Promise<SyncRecord[]>;
  listStalePending: (updatedBefore: string, limit: number) => Promise<SyncRecord[]>;
  ping: () => Promise<void>;
}

export interface RecordDeliveryResult {
  event: WebhookEventRecord;
  duplicate: boolean;
}

export interface WebhookEventStore {
  recordDelivery: (input: NewWebhookEvent) => Promise<RecordDeliveryResult>;
  markProcessed: (
    deliveryId: string,
    result: { syncRecordId: number | null; error: string | null }
  ) => Promise<WebhookEventRecord | null>;
}

/** Shape of `pg` query results the stores rely on. */
export interface QueryRunner<Row> {
  query: (
    text: string,
    values?: unknown[]
  ) => Promise<{ rowCount: number | null; rows: Row[] }>;
}
