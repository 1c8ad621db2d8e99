import type { Server } from "node:http";

import type { Pool } from "pg";

import { createGitHubClient } from "./api/githubClient";
import { createOneDevClient } from "./api/onedevClient";
import { collectSecrets, loadConfig } from "./config";
import { createMemoryStores } from "./db/memoryStore";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import type { SyncRecordStore, WebhookEventStore } from "./db/store";
import { createPgSyncRecordStore } from "./db/syncRecordStore";
import { createPgWebhookEventStore } from "./db/webhookEventStore";
import { createTransferExecutor } from "./git/transferExecutor";
import { createLogger, formatLine, type Logger } from "./logger";
import { createMetrics } from "./metrics";
import { createHttpServer } from "./server";
import { createSyncOrchestrator } from "./sync/orchestrator";
import { createRetryScheduler } from "./sync/retryScheduler";
import { createWorkQueue } from "./sync/workQueue";
import type { MirrorConfig } from "./types";
import { createWebhookReceiver } from "./webhook/receiver";

interface Stores {
  syncRecords: SyncRecordStore;
  webhookEvents: WebhookEventStore;
  pool: Pool | null;
}

async function openStores(config: MirrorConfig, logger: Logger): Promise<Stores> {
  if (config.storeDriver === "memory") {
    logger.warn("using in-memory store, sync state is lost on exit");
    const memory = createMemoryStores();
    return { syncRecords: memory.syncRecords, webhookEvents: memory.webhookEvents, pool: null };
  }

  const pool = createPool(config.databaseUrl, {
    maxConnections: config.databasePoolSize,
    logger
  });
  const applied = await runMigrations(pool);
  logger.info(formatLine("database ready", { migrationsApplied: applied }));

  return {
    syncRecords: createPgSyncRecordStore(pool),
    webhookEvents: createPgWebhookEventStore(pool),
    pool
  };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const stores = await openStores(config, logger);
  const metrics = createMetrics();

  const source = createGitHubClient({
    apiUrl: config.githubApiUrl,
    token: config.githubToken,
    timeoutMs: config.httpTimeoutMs
  });
  const destination = createOneDevClient({
    apiUrl: config.onedevApiUrl,
    token: config.onedevApiToken,
    timeoutMs: config.httpTimeoutMs
  });
  const transfer = createTransferExecutor({ workDir: config.gitWorkDir });

  const scheduler = { enqueue: (recordId: number) => queue.enqueue(recordId) };
  const orchestrator = createSyncOrchestrator(
    {
      conflictPolicy: config.conflictPolicy,
      destinationPrefix: config.onedevRepoPrefix,
      transferTimeoutMs: config.transferTimeoutMs,
      largeRepoThresholdKb: config.largeRepoThresholdKb,
      largeRepoTransferTimeoutMs: config.largeRepoTransferTimeoutMs,
      retry: config.retry,
      secrets: collectSecrets(config)
    },
    { store: stores.syncRecords, source, destination, transfer, scheduler, logger, metrics }
  );
  const queue = createWorkQueue((recordId) => orchestrator.runSync(recordId), {
    concurrency: config.workerConcurrency,
    logger
  });
  const retries = createRetryScheduler(
    { intervalMs: config.retrySweepIntervalMs, stalePendingMs: config.stalePendingMs },
    { store: stores.syncRecords, scheduler: queue, logger }
  );

  const receiver = createWebhookReceiver(config.webhookSecret, {
    orchestrator,
    events: stores.webhookEvents,
    logger,
    metrics
  });
  const server = createHttpServer({ receiver, store: stores.syncRecords, logger, metrics });

  await new Promise<void>((resolve) => {
    server.listen(config.port, "0.0.0.0", resolve);
  });
  retries.start();
  logger.info(
    formatLine("star mirror listening", {
      port: config.port,
      store: config.storeDriver,
      concurrency: config.workerConcurrency,
      conflictPolicy: config.conflictPolicy
    })
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info(formatLine("shutting down", { signal, inFlight: queue.size() }));

    await closeServer(server);
    await retries.stop();
    await queue.drain();
    if (stores.pool !== null) {
      await stores.pool.end();
    }

    logger.info("shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("shutdown failed", error);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error("star mirror failed to start", error);
  process.exit(1);
});
