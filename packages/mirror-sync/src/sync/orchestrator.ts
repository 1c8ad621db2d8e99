import type { RepoMetadata, SourceHostClient } from "../api/githubClient";
import type { DestinationHostClient, DestinationRepo } from "../api/onedevClient";
import { computeNextRetryAt } from "../api/retryPolicy";
import type { SyncRecordStore } from "../db/store";
import { NotFoundError, StaleRecordError } from "../errors";
import type { TransferExecutor, TransferOptions } from "../git/transferExecutor";
import { createLogger, formatLine, type Logger } from "../logger";
import { createMetrics, type MirrorMetrics } from "../metrics";
import type {
  AttemptEventType,
  ConflictPolicy,
  RetryPolicyConfig,
  StarEvent,
  SyncRecord,
  SyncRecordPatch,
  SyncStatus
} from "../types";
import { admit } from "./admission";
import { classifyError } from "./errorClassifier";
import { findEventDefect } from "./eventValidation";
import { resolveDestinationName } from "./naming";
import { isTerminal } from "./stateMachine";

export type OrchestrationOutcome =
  | { kind: "accepted"; recordId: number }
  | {
      kind: "already_synced";
      recordId: number;
      status: SyncStatus;
      errorMessage: string | null;
    }
  | { kind: "ignored"; reason: string }
  | { kind: "rejected_invalid"; reason: string }
  /** The store could not be reached; the delivery should be retried by the sender. */
  | { kind: "unavailable"; reason: string };

export interface OrchestratorConfig {
  conflictPolicy: ConflictPolicy;
  destinationPrefix: string;
  transferTimeoutMs: number;
  largeRepoThresholdKb: number;
  largeRepoTransferTimeoutMs: number;
  retry: RetryPolicyConfig;
  secrets: readonly string[];
}

export interface WorkScheduler {
  enqueue: (recordId: number) => void;
}

export interface OrchestratorDependencies {
  store: SyncRecordStore;
  source: SourceHostClient;
  destination: DestinationHostClient;
  transfer: TransferExecutor;
  scheduler: WorkScheduler;
  logger?: Logger;
  metrics?: MirrorMetrics;
  now?: () => number;
  random?: () => number;
}

export interface SyncOrchestrator {
  handle: (event: StarEvent) => Promise<OrchestrationOutcome>;
  runSync: (recordId: number) => Promise<void>;
}

export function planTransfer(
  metadata: Pick<RepoMetadata, "sizeKb" | "defaultBranch">,
  config: Pick<
    OrchestratorConfig,
    "transferTimeoutMs" | "largeRepoThresholdKb" | "largeRepoTransferTimeoutMs"
  >
): TransferOptions {
  if (metadata.sizeKb > config.largeRepoThresholdKb) {
    return {
      timeoutMs: config.largeRepoTransferTimeoutMs,
      strategy: "single-branch",
      branch: metadata.defaultBranch
    };
  }

  return {
    timeoutMs: config.transferTimeoutMs,
    strategy: "mirror",
    branch: metadata.defaultBranch
  };
}

export function createSyncOrchestrator(
  config: OrchestratorConfig,
  dependencies: OrchestratorDependencies
): SyncOrchestrator {
  const { store, source, destination, transfer, scheduler } = dependencies;
  const logger = dependencies.logger ?? createLogger();
  const metrics = dependencies.metrics ?? createMetrics();
  const now = dependencies.now ?? Date.now;
  const random = dependencies.random ?? Math.random;

  const isoNow = (): string => new Date(now()).toISOString();

  const move = async (
    record: SyncRecord,
    to: SyncStatus,
    patch: SyncRecordPatch = {}
  ): Promise<SyncRecord> => {
    const moved = await store.transition(record.id, record.status, to, patch);
    if (moved === null) {
      throw new StaleRecordError(record.id, record.status);
    }

    return moved;
  };

  const appendLog = async (
    record: SyncRecord,
    eventType: AttemptEventType,
    fields: {
      errorMessage?: string | null;
      errorCode?: string | null;
      durationMs?: number | null;
      bytesTransferred?: number | null;
      payload?: Record<string, unknown>;
    } = {}
  ): Promise<void> => {
    await store.appendAttemptLog({
      syncRecordId: record.id,
      eventType,
      status: record.status,
      ...fields
    });
  };

  const recordFailure = async (
    record: SyncRecord,
    error: unknown,
    startedAtMs: number
  ): Promise<void> => {
    if (error instanceof StaleRecordError) {
      logger.warn(
        formatLine("sync abandoned, record changed underneath", {
          recordId: record.id,
          expected: error.expected
        })
      );
      return;
    }

    const classified = classifyError(error, config.secrets);
    const durationMs = now() - startedAtMs;

    if (isTerminal(record.status)) {
      logger.error(
        formatLine("post-completion bookkeeping failed", {
          recordId: record.id,
          error: classified.message
        })
      );
      return;
    }

    const budgetLeft = record.retryCount < record.maxRetries;

    if (classified.kind === "transient" && budgetLeft) {
      const nextRetryAt = computeNextRetryAt(record.retryCount, config.retry, now(), random);
      const failed = await move(record, "failed", {
        errorMessage: classified.message,
        errorCode: classified.code,
        retryCount: record.retryCount + 1,
        nextRetryAt
      });
      metrics.recordSyncOperation("failed", durationMs);

      await appendLog(failed, "sync_failed", {
        errorMessage: classified.message,
        errorCode: classified.code,
        durationMs,
        payload: { terminal: false, failedDuring: record.status }
      });
      await appendLog(failed, "retry_scheduled", {
        payload: { retryCount: failed.retryCount, nextRetryAt }
      });

      logger.info(
        formatLine("sync failed, retry scheduled", {
          recordId: record.id,
          source: record.sourceFullName,
          code: classified.code,
          retryCount: failed.retryCount,
          nextRetryAt
        })
      );
      return;
    }

    const parked = await move(record, "permanent_failure", {
      errorMessage: classified.message,
      errorCode: classified.code,
      nextRetryAt: null
    });
    metrics.recordSyncOperation("permanent_failure", durationMs);

    await appendLog(parked, "sync_failed", {
      errorMessage: classified.message,
      errorCode: classified.code,
      durationMs,
      payload: {
        terminal: true,
        retriesExhausted: classified.kind === "transient",
        failedDuring: record.status
      }
    });

    logger.info(
      formatLine("sync failed permanently", {
        recordId: record.id,
        source: record.sourceFullName,
        code: classified.code,
        retryCount: parked.retryCount
      })
    );
  };

  /**
   * The conflict policy only applies the first time a record names its
   * destination; later attempts go back to the project stored on the record.
   */
  const ensureDestination = async (
    record: SyncRecord,
    metadata: RepoMetadata
  ): Promise<DestinationRepo> => {
    const description = `Mirrored from GitHub: ${metadata.fullName}`;
    const storedName = record.destinationName;

    if (storedName === null) {
      return destination.createOrGetRepo(
        resolveDestinationName(metadata.owner, metadata.name, config.destinationPrefix),
        config.conflictPolicy,
        description
      );
    }

    try {
      return await destination.getRepo(storedName);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }

      logger.warn(
        formatLine("stored destination is gone, recreating", {
          recordId: record.id,
          destination: storedName
        })
      );
      return destination.createOrGetRepo(storedName, "reuse", description);
    }
  };

  const runSteps = async (claimed: SyncRecord, startedAtMs: number): Promise<void> => {
    let current = claimed;

    try {
      await appendLog(current, "sync_started");
      logger.info(
        formatLine("sync started", {
          recordId: current.id,
          source: current.sourceFullName,
          retryCount: current.retryCount
        })
      );

      const metadata = await source.fetchRepoMetadata(current.sourceFullName);
      logger.debug(
        formatLine("source metadata fetched", {
          recordId: current.id,
          sizeKb: metadata.sizeKb,
          defaultBranch: metadata.defaultBranch
        })
      );

      const destinationRepo = await ensureDestination(current, metadata);

      current = await move(current, "in_progress", {
        sourceRepoId: metadata.id,
        sourceDefaultBranch: metadata.defaultBranch,
        sourcePrivate: metadata.private,
        sourceSizeKb: metadata.sizeKb,
        destinationUrl: destinationRepo.url,
        destinationName: destinationRepo.name,
        destinationId: destinationRepo.id,
        metadata: {
          ...current.metadata,
          htmlUrl: metadata.htmlUrl,
          description: metadata.description
        }
      });

      const plan = planTransfer(metadata, config);
      current = await move(current, "cloning");
      await appendLog(current, "clone_started", {
        payload: {
          strategy: plan.strategy,
          timeoutMs: plan.timeoutMs,
          destination: destinationRepo.name
        }
      });

      const result = await transfer.transfer(
        source.authenticatedCloneUrl(metadata.cloneUrl),
        destination.authenticatedGitUrl(destinationRepo.name),
        plan
      );

      current = await move(current, "completed", {
        lastSyncedAt: isoNow(),
        errorMessage: null,
        errorCode: null,
        retryCount: 0,
        nextRetryAt: null
      });
      metrics.recordSyncOperation("completed", now() - startedAtMs);
      await appendLog(current, "sync_completed", {
        durationMs: result.durationMs,
        bytesTransferred: result.bytesTransferred,
        payload: { strategy: plan.strategy, destination: destinationRepo.name }
      });

      logger.info(
        formatLine("sync completed", {
          recordId: current.id,
          source: current.sourceFullName,
          destination: destinationRepo.url,
          bytes: result.bytesTransferred,
          durationMs: result.durationMs
        })
      );
    } catch (error) {
      await recordFailure(current, error, startedAtMs);
    }
  };

  return {
    async handle(event: StarEvent): Promise<OrchestrationOutcome> {
      const defect = findEventDefect(event);
      if (defect !== null) {
        logger.error(
          formatLine("defect: malformed star event reached the orchestrator", {
            deliveryId: event.deliveryId,
            reason: defect
          })
        );
        return { kind: "rejected_invalid", reason: defect };
      }

      try {
        const admission = await admit(store, event, {
          maxRetries: config.retry.maxRetries,
          now
        });

        switch (admission.kind) {
          case "ignored":
            logger.debug(
              formatLine("event ignored", {
                deliveryId: event.deliveryId,
                reason: admission.reason
              })
            );
            return { kind: "ignored", reason: admission.reason };
          case "already_handled":
            logger.info(
              formatLine("event already handled", {
                deliveryId: event.deliveryId,
                recordId: admission.record.id,
                status: admission.record.status
              })
            );
            return {
              kind: "already_synced",
              recordId: admission.record.id,
              status: admission.record.status,
              errorMessage: admission.record.errorMessage
            };
          case "proceed":
            scheduler.enqueue(admission.record.id);
            logger.info(
              formatLine("sync accepted", {
                deliveryId: event.deliveryId,
                recordId: admission.record.id,
                source: admission.record.sourceFullName
              })
            );
            return { kind: "accepted", recordId: admission.record.id };
        }
      } catch (error) {
        const reason = classifyError(error, config.secrets).message;
        logger.error(
          formatLine("admission failed", { deliveryId: event.deliveryId, error: reason })
        );
        return { kind: "unavailable", reason };
      }
    },

    async runSync(recordId: number): Promise<void> {
      const startedAtMs = now();

      try {
        const claimed = await store.transition(recordId, "pending", "in_progress", {
          errorMessage: null,
          errorCode: null
        });
        if (claimed === null) {
          logger.debug(formatLine("sync skipped, record not pending", { recordId }));
          return;
        }

        metrics.activeSyncs.inc();
        try {
          await runSteps(claimed, startedAtMs);
        } finally {
          metrics.activeSyncs.dec();
        }
      } catch (error) {
        logger.error(
          formatLine("sync worker could not persist state", {
            recordId,
            error: classifyError(error, config.secrets).message
          })
        );
      }
    }
  };
}
