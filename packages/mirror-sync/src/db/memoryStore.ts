import { assertTransition } from "../sync/stateMachine";
import type {
  NewSyncRecord,
  NewWebhookEvent,
  SyncAttemptLog,
  SyncRecord,
  WebhookEventRecord
} from "../types";
import type { SyncRecordStore, WebhookEventStore } from "./store";

export interface MemoryStoreOptions {
  now?: () => number;
}

export interface MemoryStores {
  syncRecords: SyncRecordStore;
  webhookEvents: WebhookEventStore;
  /** Every attempt log in insertion order. */
  attemptLogs: () => SyncAttemptLog[];
  /** Every stored delivery in insertion order. */
  deliveries: () => WebhookEventRecord[];
}

function cloneRecord(record: SyncRecord): SyncRecord {
  return { ...record, metadata: { ...record.metadata } };
}

/**
 * In-process stand-in for the PostgreSQL stores. Status transitions are a
 * compare-and-swap on the stored status; every method completes its
 * read-check-write without yielding, so interleaved callers observe the same
 * guarantees as the conditional UPDATE.
 */
export function createMemoryStores(options: MemoryStoreOptions = {}): MemoryStores {
  const now = options.now ?? Date.now;
  const records = new Map<number, SyncRecord>();
  const idsBySourceUrl = new Map<string, number>();
  const logs: SyncAttemptLog[] = [];
  const events = new Map<string, WebhookEventRecord>();
  let nextRecordId = 1;
  let nextLogId = 1;
  let nextEventId = 1;

  const timestamp = (): string => new Date(now()).toISOString();

  const findStored = (id: number): SyncRecord | null => records.get(id) ?? null;

  const syncRecords: SyncRecordStore = {
    async findBySourceUrl(sourceUrl) {
      const id = idsBySourceUrl.get(sourceUrl);
      const record = id === undefined ? null : findStored(id);
      return record === null ? null : cloneRecord(record);
    },
    async findById(id) {
      const record = findStored(id);
      return record === null ? null : cloneRecord(record);
    },
    async createPending(input: NewSyncRecord) {
      if (idsBySourceUrl.has(input.sourceUrl)) {
        return null;
      }

      const createdAt = timestamp();
      const record: SyncRecord = {
        id: nextRecordId,
        sourceUrl: input.sourceUrl,
        sourceOwner: input.sourceOwner,
        sourceName: input.sourceName,
        sourceFullName: input.sourceFullName,
        sourceRepoId: input.sourceRepoId,
        sourceDefaultBranch: input.sourceDefaultBranch,
        sourcePrivate: input.sourcePrivate,
        sourceSizeKb: input.sourceSizeKb,
        destinationUrl: null,
        destinationName: null,
        destinationId: null,
        status: "pending",
        errorMessage: null,
        errorCode: null,
        retryCount: 0,
        maxRetries: input.maxRetries,
        createdAt,
        updatedAt: createdAt,
        lastSyncedAt: null,
        nextRetryAt: null,
        metadata: { ...(input.metadata ?? {}) }
      };

      nextRecordId += 1;
      records.set(record.id, record);
      idsBySourceUrl.set(record.sourceUrl, record.id);
      return cloneRecord(record);
    },
    async transition(id, from, to, patch = {}) {
      assertTransition(from, to);

      const stored = findStored(id);
      if (stored === null || stored.status !== from) {
        return null;
      }

      const updated: SyncRecord = {
        ...stored,
        ...patch,
        status: to,
        updatedAt: timestamp()
      };
      records.set(id, updated);
      return cloneRecord(updated);
    },
    async touchLastSynced(id, at) {
      const stored = findStored(id);
      if (stored === null) {
        return null;
      }

      const updated: SyncRecord = { ...stored, lastSyncedAt: at, updatedAt: timestamp() };
      records.set(id, updated);
      return cloneRecord(updated);
    },
    async appendAttemptLog(entry) {
      const log: SyncAttemptLog = {
        id: nextLogId,
        syncRecordId: entry.syncRecordId,
        eventType: entry.eventType,
        status: entry.status,
        errorMessage: entry.errorMessage ?? null,
        errorCode: entry.errorCode ?? null,
        durationMs: entry.durationMs ?? null,
        bytesTransferred: entry.bytesTransferred ?? null,
        payload: entry.payload ?? null,
        createdAt: timestamp()
      };

      nextLogId += 1;
      logs.push(log);
      return { ...log };
    },
    async listAttemptLogs(syncRecordId, limit) {
      return logs
        .filter((log) => log.syncRecordId === syncRecordId)
        .reverse()
        .slice(0, limit)
        .map((log) => ({ ...log }));
    },
    async listDueRetries(nowIso, limit) {
      const nowMs = Date.parse(nowIso);
      return [...records.values()]
        .filter(
          (record) =>
            record.status === "failed" &&
            record.nextRetryAt !== null &&
            Date.parse(record.nextRetryAt) <= nowMs
        )
        .sort((left, right) => Date.parse(left.nextRetryAt ?? "") - Date.parse(right.nextRetryAt ?? ""))
        .slice(0, limit)
        .map(cloneRecord);
    },
    async listStalePending(updatedBefore, limit) {
      const cutoffMs = Date.parse(updatedBefore);
      return [...records.values()]
        .filter(
          (record) => record.status === "pending" && Date.parse(record.updatedAt) <= cutoffMs
        )
        .slice(0, limit)
        .map(cloneRecord);
    },
    async ping() {
      return;
    }
  };

  const webhookEvents: WebhookEventStore = {
    async recordDelivery(input: NewWebhookEvent) {
      const existing = events.get(input.deliveryId);
      if (existing !== undefined) {
        return { event: { ...existing }, duplicate: true };
      }

      const event: WebhookEventRecord = {
        id: nextEventId,
        deliveryId: input.deliveryId,
        eventType: input.eventType,
        action: input.action,
        payload: input.payload,
        signature: input.signature,
        processed: false,
        processingError: null,
        receivedAt: timestamp(),
        processedAt: null,
        syncRecordId: null
      };

      nextEventId += 1;
      events.set(event.deliveryId, event);
      return { event: { ...event }, duplicate: false };
    },
    async markProcessed(deliveryId, result) {
      const existing = events.get(deliveryId);
      if (existing === undefined) {
        return null;
      }

      const updated: WebhookEventRecord = {
        ...existing,
        processed: true,
        processedAt: timestamp(),
        syncRecordId: result.syncRecordId,
        processingError: result.error
      };
      events.set(deliveryId, updated);
      return { ...updated };
    }
  };

  return {
    syncRecords,
    webhookEvents,
    attemptLogs: () => logs.map((log) => ({ ...log })),
    deliveries: () => [...events.values()].map((event) => ({ ...event }))
  };
}
