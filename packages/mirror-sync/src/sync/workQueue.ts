import pLimit from "p-limit";

import { formatLine, type Logger } from "../logger";

export interface WorkQueue {
  enqueue: (recordId: number) => void;
  /** Resolves once every queued and running job has settled. */
  drain: () => Promise<void>;
  size: () => number;
}

export interface WorkQueueOptions {
  concurrency: number;
  logger: Logger;
}

/**
 * Bounded worker pool for sync jobs. A record id that is already waiting is
 * not queued twice; one enqueued while its job is running runs once more
 * after that job settles. The job itself still claims the record through a
 * status CAS, so duplicates across processes are harmless.
 */
export function createWorkQueue(
  run: (recordId: number) => Promise<void>,
  options: WorkQueueOptions
): WorkQueue {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new Error(`work queue concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const limit = pLimit(options.concurrency);
  const active = new Set<number>();
  const running = new Set<number>();
  const rerun = new Set<number>();
  const jobs = new Set<Promise<void>>();

  const enqueue = (recordId: number): void => {
    if (running.has(recordId)) {
      rerun.add(recordId);
      options.logger.debug(formatLine("sync running, rerun scheduled", { recordId }));
      return;
    }

    if (active.has(recordId)) {
      options.logger.debug(formatLine("sync already queued", { recordId }));
      return;
    }

    active.add(recordId);
    const job = limit(async () => {
      running.add(recordId);
      try {
        await run(recordId);
      } catch (error) {
        options.logger.error(formatLine("sync job crashed", { recordId }), error);
      } finally {
        running.delete(recordId);
        active.delete(recordId);
        if (rerun.delete(recordId)) {
          enqueue(recordId);
        }
      }
    });

    jobs.add(job);
    void job.finally(() => {
      jobs.delete(job);
    });
  };

  return {
    enqueue,

    async drain(): Promise<void> {
      while (jobs.size > 0) {
        await Promise.all([...jobs]);
      }
    },

    size(): number {
      return active.size;
    }
  };
}
