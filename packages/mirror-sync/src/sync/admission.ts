import type { SyncRecordStore } from "../db/store";
import type { StarEvent, SyncRecord } from "../types";

export type AdmissionResult =
  | { kind: "proceed"; record: SyncRecord }
  | { kind: "already_handled"; record: SyncRecord }
  | { kind: "ignored"; reason: string };

export interface AdmissionOptions {
  maxRetries: number;
  now: () => number;
}

/** (eventType, action) pairs that mean "repository starred". */
const STAR_ACTIONS: Readonly<Record<string, string>> = {
  watch: "started",
  star: "created"
};

export function ignoreReason(event: Pick<StarEvent, "eventType" | "action">): string | null {
  const expectedAction = STAR_ACTIONS[event.eventType];

  if (expectedAction === undefined) {
    return `unsupported event type ${event.eventType}`;
  }

  if (event.eventType === "star" && event.action === "deleted") {
    return "unstar is not supported";
  }

  if (event.action !== expectedAction) {
    return `unsupported action ${event.action} for ${event.eventType} event`;
  }

  return null;
}

/**
 * Moves a failed record back to pending for another attempt. The retry was
 * already charged to `retryCount` when the failure was recorded; a record
 * whose count has outgrown its budget is parked instead.
 */
export async function reopenFailedRecord(
  store: SyncRecordStore,
  record: SyncRecord
): Promise<Exclude<AdmissionResult, { kind: "ignored" }>> {
  if (record.retryCount > record.maxRetries) {
    const parked = await store.transition(record.id, "failed", "permanent_failure", {
      nextRetryAt: null
    });
    return { kind: "already_handled", record: parked ?? record };
  }

  const reopened = await store.transition(record.id, "failed", "pending", {
    nextRetryAt: null
  });
  if (reopened === null) {
    const current = await store.findById(record.id);
    return { kind: "already_handled", record: current ?? record };
  }

  return { kind: "proceed", record: reopened };
}

async function admitExisting(
  store: SyncRecordStore,
  record: SyncRecord,
  options: AdmissionOptions
): Promise<AdmissionResult> {
  switch (record.status) {
    case "completed": {
      const touched = await store.touchLastSynced(
        record.id,
        new Date(options.now()).toISOString()
      );
      return { kind: "already_handled", record: touched ?? record };
    }
    case "pending":
    case "in_progress":
    case "cloning":
    case "permanent_failure":
      return { kind: "already_handled", record };
    case "failed":
      return reopenFailedRecord(store, record);
  }
}

export async function admit(
  store: SyncRecordStore,
  event: StarEvent,
  options: AdmissionOptions
): Promise<AdmissionResult> {
  const reason = ignoreReason(event);
  if (reason !== null) {
    return { kind: "ignored", reason };
  }

  const existing = await store.findBySourceUrl(event.sourceRepo.url);
  if (existing !== null) {
    return admitExisting(store, existing, options);
  }

  const repo = event.sourceRepo;
  const created = await store.createPending({
    sourceUrl: repo.url,
    sourceOwner: repo.owner,
    sourceName: repo.name,
    sourceFullName: repo.fullName,
    sourceRepoId: repo.id,
    sourceDefaultBranch: repo.defaultBranch,
    sourcePrivate: repo.private,
    sourceSizeKb: repo.sizeKb,
    maxRetries: options.maxRetries,
    metadata: { firstDeliveryId: event.deliveryId }
  });
  if (created !== null) {
    return { kind: "proceed", record: created };
  }

  // Lost the insert race; judge the winner's record like any existing one.
  const winner = await store.findBySourceUrl(repo.url);
  if (winner === null) {
    throw new Error(`sync record for ${repo.url} conflicted but could not be read back`);
  }

  return admitExisting(store, winner, options);
}
