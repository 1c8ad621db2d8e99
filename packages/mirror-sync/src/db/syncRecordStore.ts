import { assertTransition, isSyncStatus } from "../sync/stateMachine";
import type {
  AttemptEventType,
  NewSyncAttemptLog,
  NewSyncRecord,
  SyncAttemptLog,
  SyncRecord,
  SyncRecordPatch,
  SyncStatus
} from "../types";
import type { QueryRunner, SyncRecordStore } from "./store";

export type SyncRecordRow = {
  id: number;
  source_url: string;
  source_owner: string;
  source_name: string;
  source_full_name: string;
  source_repo_id: string | null;
  source_default_branch: string | null;
  source_private: boolean;
  source_size_kb: string | null;
  destination_url: string | null;
  destination_name: string | null;
  destination_id: string | null;
  status: string;
  error_message: string | null;
  error_code: string | null;
  retry_count: number;
  max_retries: number;
  created_at: Date;
  updated_at: Date;
  last_synced_at: Date | null;
  next_retry_at: Date | null;
  metadata: Record<string, unknown> | null;
};

export type SyncAttemptLogRow = {
  id: number;
  sync_record_id: number;
  event_type: AttemptEventType;
  status: string;
  error_message: string | null;
  error_code: string | null;
  duration_ms: string | null;
  bytes_transferred: string | null;
  payload: Record<string, unknown> | null;
  created_at: Date;
};

const SELECT_BY_SOURCE_URL_SQL = `
SELECT *
FROM sync_records
WHERE source_url = $1;
`;

const SELECT_BY_ID_SQL = `
SELECT *
FROM sync_records
WHERE id = $1;
`;

const INSERT_PENDING_SQL = `
INSERT INTO sync_records (
  source_url, source_owner, source_name, source_full_name, source_repo_id,
  source_default_branch, source_private, source_size_kb, max_retries, metadata,
  status, retry_count
)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 'pending', 0)
ON CONFLICT (source_url) DO NOTHING
RETURNING *;
`;

const TOUCH_LAST_SYNCED_SQL = `
UPDATE sync_records
SET last_synced_at = $2, updated_at = NOW()
WHERE id = $1
RETURNING *;
`;

const INSERT_ATTEMPT_LOG_SQL = `
INSERT INTO sync_attempt_logs (
  sync_record_id, event_type, status, error_message, error_code,
  duration_ms, bytes_transferred, payload
)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
RETURNING *;
`;

const SELECT_ATTEMPT_LOGS_SQL = `
SELECT *
FROM sync_attempt_logs
WHERE sync_record_id = $1
ORDER BY created_at DESC, id DESC
LIMIT $2;
`;

const SELECT_DUE_RETRIES_SQL = `
SELECT *
FROM sync_records
WHERE status = 'failed' AND next_retry_at <= $1
ORDER BY next_retry_at ASC
LIMIT $2;
`;

const SELECT_STALE_PENDING_SQL = `
SELECT *
FROM sync_records
WHERE status = 'pending' AND updated_at <= $1
ORDER BY updated_at ASC
LIMIT $2;
`;

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof SyncRecordPatch, string]> = [
  ["sourceRepoId", "source_repo_id"],
  ["sourceDefaultBranch", "source_default_branch"],
  ["sourcePrivate", "source_private"],
  ["sourceSizeKb", "source_size_kb"],
  ["destinationUrl", "destination_url"],
  ["destinationName", "destination_name"],
  ["destinationId", "destination_id"],
  ["errorMessage", "error_message"],
  ["errorCode", "error_code"],
  ["retryCount", "retry_count"],
  ["lastSyncedAt", "last_synced_at"],
  ["nextRetryAt", "next_retry_at"],
  ["metadata", "metadata"]
];

function toNumberOrNull(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }

  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function toIsoOrNull(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

function toStatus(value: string): SyncStatus {
  if (!isSyncStatus(value)) {
    throw new Error(`Unknown sync status in database: ${value}`);
  }

  return value;
}

export function rowToSyncRecord(row: SyncRecordRow): SyncRecord {
  return {
    id: row.id,
    sourceUrl: row.source_url,
    sourceOwner: row.source_owner,
    sourceName: row.source_name,
    sourceFullName: row.source_full_name,
    sourceRepoId: toNumberOrNull(row.source_repo_id),
    sourceDefaultBranch: row.source_default_branch,
    sourcePrivate: row.source_private,
    sourceSizeKb: toNumberOrNull(row.source_size_kb),
    destinationUrl: row.destination_url,
    destinationName: row.destination_name,
    destinationId: toNumberOrNull(row.destination_id),
    status: toStatus(row.status),
    errorMessage: row.error_message,
    errorCode: row.error_code,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    lastSyncedAt: toIsoOrNull(row.last_synced_at),
    nextRetryAt: toIsoOrNull(row.next_retry_at),
    metadata: row.metadata ?? {}
  };
}

export function rowToAttemptLog(row: SyncAttemptLogRow): SyncAttemptLog {
  return {
    id: row.id,
    syncRecordId: row.sync_record_id,
    eventType: row.event_type,
    status: toStatus(row.status),
    errorMessage: row.error_message,
    errorCode: row.error_code,
    durationMs: toNumberOrNull(row.duration_ms),
    bytesTransferred: toNumberOrNull(row.bytes_transferred),
    payload: row.payload,
    createdAt: row.created_at.toISOString()
  };
}

/**
 * Conditional update: only matches while the stored status still equals
 * `from`, so two workers can never both move a record out of one state.
 */
export function buildTransitionStatement(
  id: number,
  from: SyncStatus,
  to: SyncStatus,
  patch: SyncRecordPatch
): { sql: string; values: unknown[] } {
  const assignments = ["status = $3", "updated_at = NOW()"];
  const values: unknown[] = [id, from, to];

  for (const [key, column] of PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) {
      continue;
    }

    values.push(key === "metadata" ? JSON.stringify(value) : value);
    assignments.push(`${column} = $${values.length}`);
  }

  return {
    sql: `
UPDATE sync_records
SET ${assignments.join(", ")}
WHERE id = $1 AND status = $2
RETURNING *;
`,
    values
  };
}

function firstRecord(result: { rows: SyncRecordRow[] }): SyncRecord | null {
  const row = result.rows[0];
  return row === undefined ? null : rowToSyncRecord(row);
}

export async function findSyncRecordBySourceUrl(
  runner: QueryRunner<SyncRecordRow>,
  sourceUrl: string
): Promise<SyncRecord | null> {
  return firstRecord(await runner.query(SELECT_BY_SOURCE_URL_SQL, [sourceUrl]));
}

export async function findSyncRecordById(
  runner: QueryRunner<SyncRecordRow>,
  id: number
): Promise<SyncRecord | null> {
  return firstRecord(await runner.query(SELECT_BY_ID_SQL, [id]));
}

export async function insertPendingSyncRecord(
  runner: QueryRunner<SyncRecordRow>,
  input: NewSyncRecord
): Promise<SyncRecord | null> {
  const result = await runner.query(INSERT_PENDING_SQL, [
    input.sourceUrl,
    input.sourceOwner,
    input.sourceName,
    input.sourceFullName,
    input.sourceRepoId,
    input.sourceDefaultBranch,
    input.sourcePrivate,
    input.sourceSizeKb,
    input.maxRetries,
    JSON.stringify(input.metadata ?? {})
  ]);

  return firstRecord(result);
}

export async function transitionSyncRecord(
  runner: QueryRunner<SyncRecordRow>,
  id: number,
  from: SyncStatus,
  to: SyncStatus,
  patch: SyncRecordPatch = {}
): Promise<SyncRecord | null> {
  assertTransition(from, to);

  const statement = buildTransitionStatement(id, from, to, patch);
  return firstRecord(await runner.query(statement.sql, statement.values));
}

export async function insertAttemptLog(
  runner: QueryRunner<SyncAttemptLogRow>,
  entry: NewSyncAttemptLog
): Promise<SyncAttemptLog> {
  const result = await runner.query(INSERT_ATTEMPT_LOG_SQL, [
    entry.syncRecordId,
    entry.eventType,
    entry.status,
    entry.errorMessage ?? null,
    entry.errorCode ?? null,
    entry.durationMs ?? null,
    entry.bytesTransferred ?? null,
    entry.payload === undefined || entry.payload === null
      ? null
      : JSON.stringify(entry.payload)
  ]);

  const row = result.rows[0];
  if (row === undefined) {
    throw new Error(`failed to append attempt log for sync record ${entry.syncRecordId}`);
  }

  return rowToAttemptLog(row);
}

export function createPgSyncRecordStore(
  runner: QueryRunner<SyncRecordRow> & QueryRunner<SyncAttemptLogRow>
): SyncRecordStore {
  return {
    findBySourceUrl: (sourceUrl) => findSyncRecordBySourceUrl(runner, sourceUrl),
    findById: (id) => findSyncRecordById(runner, id),
    createPending: (input) => insertPendingSyncRecord(runner, input),
    transition: (id, from, to, patch) =>
      transitionSyncRecord(runner, id, from, to, patch),
    async touchLastSynced(id, at) {
      return firstRecord(await runner.query(TOUCH_LAST_SYNCED_SQL, [id, at]));
    },
    appendAttemptLog: (entry) => insertAttemptLog(runner, entry),
    async listAttemptLogs(syncRecordId, limit) {
      const logsRunner: QueryRunner<SyncAttemptLogRow> = runner;
      const result = await logsRunner.query(SELECT_ATTEMPT_LOGS_SQL, [syncRecordId, limit]);
      return result.rows.map(rowToAttemptLog);
    },
    async listDueRetries(now, limit) {
      const recordsRunner: QueryRunner<SyncRecordRow> = runner;
      const result = await recordsRunner.query(SELECT_DUE_RETRIES_SQL, [now, limit]);
      return result.rows.map(rowToSyncRecord);
    },
    async listStalePending(updatedBefore, limit) {
      const recordsRunner: QueryRunner<SyncRecordRow> = runner;
      const result = await recordsRunner.query(SELECT_STALE_PENDING_SQL, [
        updatedBefore,
        limit
      ]);
      return result.rows.map(rowToSyncRecord);
    },
    async ping() {
      await runner.query("SELECT 1;");
    }
  };
}
