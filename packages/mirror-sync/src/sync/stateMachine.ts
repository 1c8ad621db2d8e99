import { IllegalTransitionError } from "../errors";
import type { SyncStatus } from "../types";

export const SYNC_STATUSES: readonly SyncStatus[] = [
  "pending",
  "in_progress",
  "cloning",
  "completed",
  "failed",
  "permanent_failure"
];

const TRANSITIONS: Readonly<Record<SyncStatus, readonly SyncStatus[]>> = {
  pending: ["in_progress"],
  // in_progress -> in_progress persists destination identity without moving on
  in_progress: ["in_progress", "cloning", "failed", "permanent_failure"],
  cloning: ["completed", "failed", "permanent_failure"],
  completed: [],
  failed: ["pending", "permanent_failure"],
  permanent_failure: []
};

export function canTransition(from: SyncStatus, to: SyncStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: SyncStatus, to: SyncStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}

export function isTerminal(status: SyncStatus): boolean {
  return status === "completed" || status === "permanent_failure";
}

/** Work for the record is queued or running. */
export function isInFlight(status: SyncStatus): boolean {
  return status === "pending" || status === "in_progress" || status === "cloning";
}

export function isSyncStatus(value: unknown): value is SyncStatus {
  return typeof value === "string" && SYNC_STATUSES.some((status) => status === value);
}
