import { afterEach, describe, expect, it, vi } from "vitest";

import { createMemoryStores } from "../src/db/memoryStore";
import type { SyncRecordStore } from "../src/db/store";
import { createRetryScheduler } from "../src/sync/retryScheduler";
import type { SyncRecord, SyncRecordPatch } from "../src/types";
import { START, captureLogger } from "./helpers";

async function seed(
  store: SyncRecordStore,
  name: string,
  failure: SyncRecordPatch | null
): Promise<SyncRecord> {
  const created = await store.createPending({
    sourceUrl: `https://github.test/acme/${name}.git`,
    sourceOwner: "acme",
    sourceName: name,
    sourceFullName: `acme/${name}`,
    sourceRepoId: null,
    sourceDefaultBranch: null,
    sourcePrivate: false,
    sourceSizeKb: null,
    maxRetries: 3
  });
  if (created === null) {
    throw new Error(`duplicate seed ${name}`);
  }

  if (failure === null) {
    return created;
  }

  await store.transition(created.id, "pending", "in_progress");
  const failed = await store.transition(created.id, "in_progress", "failed", failure);
  if (failed === null) {
    throw new Error(`could not fail seed ${name}`);
  }

  return failed;
}

function setup(wrapStore: (store: SyncRecordStore) => SyncRecordStore = (store) => store) {
  const clock = { now: START };
  const stores = createMemoryStores({ now: () => clock.now });
  const { logger, lines } = captureLogger();
  const enqueued: number[] = [];
  const retries = createRetryScheduler(
    { intervalMs: 1000, stalePendingMs: 30_000 },
    {
      store: wrapStore(stores.syncRecords),
      scheduler: {
        enqueue: (recordId) => {
          enqueued.push(recordId);
        }
      },
      logger,
      now: () => clock.now
    }
  );

  return { clock, stores, lines, enqueued, retries };
}

describe("createRetryScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reopens due retries, parks exhausted records and requeues stale pending ones", async () => {
    const { clock, stores, lines, enqueued, retries } = setup();
    const due = await seed(stores.syncRecords, "due", {
      retryCount: 1,
      nextRetryAt: "2026-01-01T00:00:04.000Z"
    });
    const exhausted = await seed(stores.syncRecords, "exhausted", {
      retryCount: 4,
      nextRetryAt: "2026-01-01T00:00:01.000Z"
    });
    const later = await seed(stores.syncRecords, "later", {
      retryCount: 1,
      nextRetryAt: "2026-01-01T00:10:00.000Z"
    });
    const stale = await seed(stores.syncRecords, "stale", null);

    clock.now = START + 60_000;
    const result = await retries.sweep();

    expect(result).toEqual({ reopened: 1, parked: 1, requeued: 1 });
    expect(enqueued).toEqual([due.id, stale.id]);
    expect((await stores.syncRecords.findById(due.id))?.status).toBe("pending");
    expect((await stores.syncRecords.findById(exhausted.id))?.status).toBe("permanent_failure");
    expect((await stores.syncRecords.findById(later.id))?.status).toBe("failed");
    expect(lines).toContain("retry sweep (reopened=1, parked=1, requeued=1)");
  });

  it("keeps quiet when there is nothing to do", async () => {
    const { lines, enqueued, retries } = setup();

    await expect(retries.sweep()).resolves.toEqual({ reopened: 0, parked: 0, requeued: 0 });
    expect(enqueued).toEqual([]);
    expect(lines).toEqual([]);
  });

  it("does not start a sweep while one is running", async () => {
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { retries } = setup((store) => ({
      ...store,
      listDueRetries: async (now, limit) => {
        await blocked;
        return store.listDueRetries(now, limit);
      }
    }));

    const first = retries.sweep();
    const second = await retries.sweep();
    release();

    expect(second).toBeNull();
    await expect(first).resolves.toEqual({ reopened: 0, parked: 0, requeued: 0 });
    await expect(retries.sweep()).resolves.not.toBeNull();
  });

  it("sweeps on its interval until stopped", async () => {
    vi.useFakeTimers();
    const listDueRetries = vi.fn<[string, number], Promise<SyncRecord[]>>(async () => []);
    const { retries } = setup((store) => ({ ...store, listDueRetries }));

    retries.start();
    retries.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(listDueRetries).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(listDueRetries).toHaveBeenCalledTimes(3);

    await retries.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(listDueRetries).toHaveBeenCalledTimes(3);
  });

  it("logs a failed sweep and keeps its schedule", async () => {
    vi.useFakeTimers();
    const listDueRetries = vi.fn<[string, number], Promise<SyncRecord[]>>(async () => {
      throw new Error("connection terminated");
    });
    const { lines, retries } = setup((store) => ({ ...store, listDueRetries }));

    retries.start();
    await vi.advanceTimersByTimeAsync(2000);
    await retries.stop();

    expect(listDueRetries).toHaveBeenCalledTimes(2);
    expect(lines).toEqual(["error: retry sweep failed", "error: retry sweep failed"]);
  });
});
