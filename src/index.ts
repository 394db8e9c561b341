import { Server } from "http";
import { setTimeout as sleep } from "timers/promises";
import { config, validateConfig } from "./config.js";
import { logger } from "./logger.js";
import { SERVICE_NAME, SERVICE_VERSION, USER_AGENT } from "./constants.js";
import { startApiServer } from "./api/server.js";
import { getPool, closePool, waitForDatabase } from "./db/pool.js";
import { Fetcher } from "./fetcher/fetcher.js";
import { Validator } from "./validator/validator.js";
import { ArtifactVerifier } from "./validator/artifact.js";
import { DedupCache } from "./cache/dedup-cache.js";
import { PipelineCoordinator } from "./pipeline/coordinator.js";
import { PostgresSink, PostgresCheckpointStore, ensureSchema } from "./sink/postgres-sink.js";
import { PostgresEventSource } from "./source/postgres-source.js";
import type { ValidatedDocument } from "./types.js";

/**
 * Approximate retained size of a cached document: its JSON length.
 */
function documentSize(document: ValidatedDocument): number {
  return JSON.stringify(document).length;
}

async function main() {
  try {
    validateConfig();
  } catch (error) {
    logger.fatal({ error }, "Configuration validation failed");
    process.exit(1);
  }

  logger.info(
    {
      version: SERVICE_VERSION,
      workers: config.workers,
      prefetch: config.prefetch,
      ipfsGateways: config.ipfsGateways.map((gateway) => gateway.baseUrl),
      arweaveGateways: config.arweaveGateways.map((gateway) => gateway.baseUrl),
      defaultAssetClass: config.defaultAssetClass,
    },
    `Starting ${SERVICE_NAME}`
  );

  if (config.startupWaitMs > 0) {
    logger.info({ waitMs: config.startupWaitMs }, "Waiting before startup");
    await sleep(config.startupWaitMs);
  }

  const pool = getPool();
  await waitForDatabase(pool);
  await ensureSchema(pool);

  const source = new PostgresEventSource(pool, {
    pollIntervalMs: config.pollIntervalMs,
    batchSize: config.batchSize,
  });

  const fetcher = new Fetcher({
    ipfsGateways: config.ipfsGateways,
    arweaveGateways: config.arweaveGateways,
    httpTimeoutMs: config.httpTimeoutMs,
    maxBytes: config.metadataMaxBytes,
    allowPrivateHosts: config.allowPrivateHosts,
    userAgent: USER_AGENT,
  });

  const coordinator = new PipelineCoordinator({
    source,
    checkpointStore: new PostgresCheckpointStore(pool),
    fetcher,
    validator: new Validator({ gridSize: config.gridSize }),
    artifactVerifier: new ArtifactVerifier({
      fetcher,
      maxBytes: config.artifactMaxBytes,
      polygonToleranceBps: config.polygonCountToleranceBps,
    }),
    cache: new DedupCache<ValidatedDocument>({
      maxEntries: config.dedupCacheMaxEntries,
      maxBytes: config.dedupCacheMaxBytes,
      sizeOf: documentSize,
    }),
    sink: new PostgresSink(pool),
    concurrency: config.workers,
    prefetch: config.prefetch,
    maxAttempts: config.maxAttempts,
    backoff: {
      baseMs: config.retryBaseDelayMs,
      factor: config.retryBackoffFactor,
      maxMs: config.retryMaxDelayMs,
    },
    deadlineMs: config.eventDeadlineMs,
    checkpointIntervalMs: config.checkpointIntervalMs,
    defaultAssetClass: config.defaultAssetClass,
  });

  // Start health server before the pipeline (liveness during DB catch-up)
  let apiServer: Server | null = null;
  if (config.healthEnabled) {
    apiServer = await startApiServer({ coordinator, port: config.apiPort });
  }

  await coordinator.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");

    try {
      await coordinator.stop();
      const server = apiServer;
      if (server) {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
        logger.info("Health server closed");
      }
      await closePool();
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (error) {
      logger.error({ error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  logger.info(`${SERVICE_NAME} is running`);
}

main().catch((error) => {
  logger.fatal({ error }, "Unhandled error");
  process.exit(1);
});
