import type { SyncRecordStore } from "../db/store";
import { formatLine, type Logger } from "../logger";
import { reopenFailedRecord } from "./admission";
import type { WorkScheduler } from "./orchestrator";

export interface RetrySchedulerOptions {
  intervalMs: number;
  stalePendingMs: number;
  batchSize?: number;
}

export interface RetrySchedulerDependencies {
  store: SyncRecordStore;
  scheduler: WorkScheduler;
  logger: Logger;
  now?: () => number;
}

export interface SweepResult {
  reopened: number;
  parked: number;
  requeued: number;
}

export interface RetryScheduler {
  /** Runs one sweep; returns null when a sweep is already running. */
  sweep: () => Promise<SweepResult | null>;
  start: () => void;
  stop: () => Promise<void>;
}

const DEFAULT_BATCH_SIZE = 50;

export function createRetryScheduler(
  options: RetrySchedulerOptions,
  dependencies: RetrySchedulerDependencies
): RetryScheduler {
  const { store, scheduler, logger } = dependencies;
  const now = dependencies.now ?? Date.now;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  let timer: NodeJS.Timeout | null = null;
  let running: Promise<SweepResult> | null = null;

  const runSweep = async (): Promise<SweepResult> => {
    const result: SweepResult = { reopened: 0, parked: 0, requeued: 0 };
    const nowMs = now();

    const due = await store.listDueRetries(new Date(nowMs).toISOString(), batchSize);
    for (const record of due) {
      const reopened = await reopenFailedRecord(store, record);
      if (reopened.kind === "proceed") {
        result.reopened += 1;
        scheduler.enqueue(reopened.record.id);
      } else if (reopened.record.status === "permanent_failure") {
        result.parked += 1;
      }
    }

    const stale = await store.listStalePending(
      new Date(nowMs - options.stalePendingMs).toISOString(),
      batchSize
    );
    for (const record of stale) {
      result.requeued += 1;
      scheduler.enqueue(record.id);
    }

    if (result.reopened + result.parked + result.requeued > 0) {
      logger.info(
        formatLine("retry sweep", {
          reopened: result.reopened,
          parked: result.parked,
          requeued: result.requeued
        })
      );
    }

    return result;
  };

  const sweep = async (): Promise<SweepResult | null> => {
    if (running !== null) {
      return null;
    }

    running = runSweep();
    try {
      return await running;
    } finally {
      running = null;
    }
  };

  return {
    sweep,

    start(): void {
      if (timer !== null) {
        return;
      }

      timer = setInterval(() => {
        sweep().catch((error: unknown) => {
          logger.error("retry sweep failed", error);
        });
      }, options.intervalMs);
      timer.unref();
    },

    async stop(): Promise<void> {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }

      if (running !== null) {
        await running.catch(() => undefined);
      }
    }
  };
}
