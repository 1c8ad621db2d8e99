import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const SYNC_DURATION_BUCKETS = [1, 5, 10, 30, 60, 120, 300, 600];

/** Labels for `webhook_requests_total` that are not an orchestration outcome. */
export type WebhookRejection = "bad_request" | "invalid_signature" | "error";

export type SyncOperationStatus = "completed" | "failed" | "permanent_failure";

export interface MirrorMetrics {
  registry: Registry;
  webhookRequests: Counter<"event_type" | "status">;
  syncOperations: Counter<"status">;
  syncDuration: Histogram;
  activeSyncs: Gauge;
  databaseHealth: Gauge;
  recordSyncOperation: (status: SyncOperationStatus, durationMs: number) => void;
}

/**
 * Each call gets its own registry, so a process normally holds a single
 * instance shared by the orchestrator, the receiver and the server.
 */
export function createMetrics(): MirrorMetrics {
  const registry = new Registry();
  const registers = [registry];

  const webhookRequests = new Counter({
    name: "webhook_requests_total",
    help: "Total number of webhook requests",
    labelNames: ["event_type", "status"] as const,
    registers
  });
  const syncOperations = new Counter({
    name: "sync_operations_total",
    help: "Total number of sync operations",
    labelNames: ["status"] as const,
    registers
  });
  const syncDuration = new Histogram({
    name: "sync_duration_seconds",
    help: "Duration of sync operations in seconds",
    buckets: SYNC_DURATION_BUCKETS,
    registers
  });
  const activeSyncs = new Gauge({
    name: "active_syncs",
    help: "Number of currently active sync operations",
    registers
  });
  const databaseHealth = new Gauge({
    name: "database_health",
    help: "Database health status (1=connected, 0=disconnected)",
    registers
  });

  return {
    registry,
    webhookRequests,
    syncOperations,
    syncDuration,
    activeSyncs,
    databaseHealth,
    recordSyncOperation(status: SyncOperationStatus, durationMs: number): void {
      syncOperations.inc({ status });
      syncDuration.observe(durationMs / 1000);
    }
  };
}
