export type SyncStatus =
  | "pending"
  | "in_progress"
  | "cloning"
  | "completed"
  | "failed"
  | "permanent_failure";

export type ConflictPolicy = "reuse" | "suffix" | "fail";

export type TransferStrategy = "mirror" | "single-branch";

export type StoreDriver = "postgres" | "memory";

export interface SourceRepo {
  url: string;
  owner: string;
  name: string;
  fullName: string;
  id: number;
  defaultBranch: string;
  private: boolean;
  sizeKb: number;
}

/**
 * A webhook delivery after signature check and payload parsing. The
 * orchestrator never sees raw bytes or headers.
 */
export interface StarEvent {
  eventType: string;
  action: string;
  deliveryId: string;
  sourceRepo: SourceRepo;
}

export interface SyncRecord {
  id: number;
  sourceUrl: string;
  sourceOwner: string;
  sourceName: string;
  sourceFullName: string;
  sourceRepoId: number | null;
  sourceDefaultBranch: string | null;
  sourcePrivate: boolean;
  sourceSizeKb: number | null;
  destinationUrl: string | null;
  destinationName: string | null;
  destinationId: number | null;
  status: SyncStatus;
  errorMessage: string | null;
  errorCode: string | null;
  retryCount: number;
  maxRetries: number;
  createdAt: string;
  updatedAt: string;
  lastSyncedAt: string | null;
  nextRetryAt: string | null;
  metadata: Record<string, unknown>;
}

export interface NewSyncRecord {
  sourceUrl: string;
  sourceOwner: string;
  sourceName: string;
  sourceFullName: string;
  sourceRepoId: number | null;
  sourceDefaultBranch: string | null;
  sourcePrivate: boolean;
  sourceSizeKb: number | null;
  maxRetries: number;
  metadata?: Record<string, unknown>;
}

/** Fields a status transition may write alongside the new status. */
export type SyncRecordPatch = Partial<
  Pick<
    SyncRecord,
    | "sourceRepoId"
    | "sourceDefaultBranch"
    | "sourcePrivate"
    | "sourceSizeKb"
    | "destinationUrl"
    | "destinationName"
    | "destinationId"
    | "errorMessage"
    | "errorCode"
    | "retryCount"
    | "lastSyncedAt"
    | "nextRetryAt"
    | "metadata"
  >
>;

export type AttemptEventType =
  | "sync_started"
  | "clone_started"
  | "sync_completed"
  | "sync_failed"
  | "retry_scheduled";

export interface SyncAttemptLog {
  id: number;
  syncRecordId: number;
  eventType: AttemptEventType;
  status: SyncStatus;
  errorMessage: string | null;
  errorCode: string | null;
  durationMs: number | null;
  bytesTransferred: number | null;
  payload: Record<string, unknown> | null;
  createdAt: string;
}

export interface NewSyncAttemptLog {
  syncRecordId: number;
  eventType: AttemptEventType;
  status: SyncStatus;
  errorMessage?: string | null;
  errorCode?: string | null;
  durationMs?: number | null;
  bytesTransferred?: number | null;
  payload?: Record<string, unknown> | null;
}

export interface WebhookEventRecord {
  id: number;
  deliveryId: string;
  eventType: string;
  action: string | null;
  payload: unknown;
  signature: string;
  processed: boolean;
  processingError: string | null;
  receivedAt: string;
  processedAt: string | null;
  syncRecordId: number | null;
}

export interface NewWebhookEvent {
  deliveryId: string;
  eventType: string;
  action: string | null;
  payload: unknown;
  signature: string;
}

export interface RetryPolicyConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface MirrorConfig {
  port: number;
  databaseUrl: string;
  databasePoolSize: number;
  storeDriver: StoreDriver;
  webhookSecret: string;
  githubApiUrl: string;
  githubToken: string;
  onedevApiUrl: string;
  onedevApiToken: string;
  onedevRepoPrefix: string;
  conflictPolicy: ConflictPolicy;
  httpTimeoutMs: number;
  transferTimeoutMs: number;
  largeRepoThresholdKb: number;
  largeRepoTransferTimeoutMs: number;
  gitWorkDir: string;
  retry: RetryPolicyConfig;
  retrySweepIntervalMs: number;
  stalePendingMs: number;
  workerConcurrency: number;
  logLevel: string;
}
