import { describe, expect, it } from "vitest";

import { SYNC_DURATION_BUCKETS, createMetrics } from "../src/metrics";

describe("createMetrics", () => {
  it("records a sync outcome with its duration in seconds", async () => {
    const metrics = createMetrics();

    metrics.recordSyncOperation("failed", 12_000);
    metrics.recordSyncOperation("failed", 700);
    metrics.recordSyncOperation("completed", 45_000);

    const operations = await metrics.syncOperations.get();
    expect(operations.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { status: "failed" }, value: 2 }),
        expect.objectContaining({ labels: { status: "completed" }, value: 1 })
      ])
    );

    const text = (await metrics.registry.metrics()).split("\n");
    expect(text).toContain('sync_duration_seconds_bucket{le="1"} 1');
    expect(text).toContain('sync_duration_seconds_bucket{le="30"} 2');
    expect(text).toContain('sync_duration_seconds_bucket{le="60"} 3');
    expect(text).toContain("sync_duration_seconds_count 3");
  });

  it("uses the sync duration buckets", () => {
    expect(SYNC_DURATION_BUCKETS).toEqual([1, 5, 10, 30, 60, 120, 300, 600]);
  });

  it("keeps each instance's series apart", async () => {
    const first = createMetrics();
    const second = createMetrics();

    first.webhookRequests.inc({ event_type: "watch", status: "accepted" });
    first.activeSyncs.inc();

    expect((await second.webhookRequests.get()).values).toEqual([]);
    expect((await second.activeSyncs.get()).values).toEqual([
      expect.objectContaining({ value: 0 })
    ]);
    expect((await first.registry.metrics()).split("\n")).toContain(
      'webhook_requests_total{event_type="watch",status="accepted"} 1'
    );
  });
});
