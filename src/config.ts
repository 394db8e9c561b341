import "dotenv/config";
import { ASSET_CLASSES, isAssetClass } from "./types.js";
import type { AssetClass, GatewayConfig } from "./types.js";

const DEFAULT_IPFS_GATEWAYS = [
  "https://ipfs.io",
  "https://cloudflare-ipfs.com",
  "https://nftstorage.link",
  "https://infura-ipfs.io",
];
const DEFAULT_ARWEAVE_GATEWAYS = ["https://arweave.net"];

function parseAssetClass(value: string | undefined): AssetClass {
  const assetClass = value || "token";
  if (!isAssetClass(assetClass)) {
    throw new Error(
      `Invalid DEFAULT_ASSET_CLASS '${assetClass}'. Must be one of: ${ASSET_CLASSES.join(", ")}`
    );
  }
  return assetClass;
}

/**
 * Parse a comma-separated gateway list. Each entry is either a base URL
 * or `baseUrl|timeoutMs` to override the shared timeout for that gateway.
 */
export function parseGateways(
  value: string | undefined,
  defaults: string[],
  defaultTimeoutMs: number
): GatewayConfig[] {
  const entries = value
    ? value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0)
    : defaults;

  return entries.map((entry) => {
    const [rawUrl, rawTimeout] = entry.split("|");
    let url: URL;
    try {
      url = new URL(rawUrl.trim());
    } catch {
      throw new Error(`Invalid gateway URL '${rawUrl}'`);
    }
    if (url.protocol !== "https:" && url.protocol !== "http:") {
      throw new Error(`Gateway '${rawUrl}' must use http or https`);
    }

    let timeoutMs = defaultTimeoutMs;
    if (rawTimeout !== undefined) {
      timeoutMs = parseInt(rawTimeout, 10);
      if (isNaN(timeoutMs) || timeoutMs <= 0) {
        throw new Error(`Invalid timeout '${rawTimeout}' for gateway '${rawUrl}'`);
      }
    }

    return { baseUrl: url.toString().replace(/\/+$/, ""), timeoutMs };
  });
}

// Parse errors found while loading, reported by validateConfig()
const configErrors: string[] = [];

function parseOr<T>(parse: () => T, fallback: T): T {
  try {
    return parse();
  } catch (error) {
    configErrors.push(error instanceof Error ? error.message : String(error));
    return fallback;
  }
}

const gatewayTimeoutMs = parseInt(process.env.GATEWAY_TIMEOUT_MS || "10000", 10);
const workers = parseInt(process.env.PROCESSING_WORKERS || "4", 10);

const ipfsGateways = parseOr(
  () => parseGateways(process.env.IPFS_GATEWAYS, DEFAULT_IPFS_GATEWAYS, gatewayTimeoutMs),
  []
);
if (process.env.IPFS_FALLBACK_GATEWAY) {
  // Self-hosted node, tried last
  ipfsGateways.push(...parseOr(() => parseGateways(process.env.IPFS_FALLBACK_GATEWAY, [], gatewayTimeoutMs), []));
}

export const config = {
  // Datastore (PostgreSQL)
  databaseUrl: process.env.DATABASE_URL,
  dbSsl: process.env.DB_SSL === "true",
  dbSslVerify: process.env.DB_SSL_VERIFY !== "false", // default: verify SSL certs
  dbPoolMax: parseInt(process.env.DB_POOL_MAX || "10", 10),

  // Content-addressed gateways, tried in order
  ipfsGateways,
  arweaveGateways: parseOr(
    () => parseGateways(process.env.ARWEAVE_GATEWAYS, DEFAULT_ARWEAVE_GATEWAYS, gatewayTimeoutMs),
    []
  ),
  gatewayTimeoutMs,

  // Direct HTTP(S) fetches
  httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || "10000", 10),
  // Maximum bytes to fetch from a metadata URI (prevents memory exhaustion)
  metadataMaxBytes: parseInt(process.env.METADATA_MAX_BYTES || "262144", 10), // 256KB
  // Only for local development against a gateway on a private network
  allowPrivateHosts: process.env.ALLOW_PRIVATE_HOSTS === "true",

  // Worker pool
  workers,
  prefetch: parseInt(process.env.PREFETCH || String(workers * 2), 10),

  // Retry / quarantine
  maxAttempts: parseInt(process.env.MAX_ATTEMPTS || "5", 10),
  retryBaseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || "10000", 10),
  retryBackoffFactor: parseFloat(process.env.RETRY_BACKOFF_FACTOR || "1.5"),
  retryMaxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || "300000", 10), // 5min
  eventDeadlineMs: parseInt(process.env.EVENT_DEADLINE_MS || "3600000", 10), // 1h

  // Dedup cache
  dedupCacheMaxEntries: parseInt(process.env.DEDUP_CACHE_MAX_ENTRIES || "10000", 10),
  dedupCacheMaxBytes: parseInt(process.env.DEDUP_CACHE_MAX_BYTES || "67108864", 10), // 64MB

  // Validation
  defaultAssetClass: parseOr<AssetClass>(() => parseAssetClass(process.env.DEFAULT_ASSET_CLASS), "token"),
  gridSize: parseFloat(process.env.GRID_SIZE || "100"),

  // Item artifacts (3D models, images) referenced by artifactUri
  artifactMaxBytes: parseInt(process.env.ARTIFACT_MAX_BYTES || "67108864", 10), // 64MB
  // Allowed excess of counted over declared polygons, in basis points
  polygonCountToleranceBps: parseInt(process.env.POLYGON_COUNT_TOLERANCE_BPS || "100", 10),

  // Event source
  pollIntervalMs: parseInt(process.env.POLL_INTERVAL_MS || "5000", 10),
  batchSize: parseInt(process.env.BATCH_SIZE || "100", 10),
  checkpointIntervalMs: parseInt(process.env.CHECKPOINT_INTERVAL_MS || "10000", 10),
  startupWaitMs: parseInt(process.env.STARTUP_WAIT_MS || "0", 10),

  // Health surface
  healthEnabled: process.env.HEALTH_ENABLED !== "false",
  apiPort: parseInt(process.env.API_PORT || "3001", 10),

  // Logging
  logLevel: process.env.LOG_LEVEL || "info",
} as const;

export type Config = typeof config;

export function validateConfig(): void {
  if (configErrors.length > 0) {
    throw new Error(configErrors[0]);
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required");
  }

  if (config.ipfsGateways.length === 0) {
    throw new Error("At least one IPFS gateway must be configured");
  }

  if (isNaN(config.workers) || config.workers < 1 || config.workers > 256) {
    throw new Error("PROCESSING_WORKERS must be between 1 and 256");
  }

  if (isNaN(config.prefetch) || config.prefetch < config.workers) {
    throw new Error("PREFETCH must be at least PROCESSING_WORKERS");
  }

  if (isNaN(config.maxAttempts) || config.maxAttempts < 1) {
    throw new Error("MAX_ATTEMPTS must be at least 1");
  }

  if (isNaN(config.retryBackoffFactor) || config.retryBackoffFactor < 1) {
    throw new Error("RETRY_BACKOFF_FACTOR must be at least 1");
  }

  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new Error("RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS");
  }

  if (isNaN(config.metadataMaxBytes) || config.metadataMaxBytes < 1024) {
    throw new Error("METADATA_MAX_BYTES must be at least 1024");
  }

  if (isNaN(config.artifactMaxBytes) || config.artifactMaxBytes < 1024) {
    throw new Error("ARTIFACT_MAX_BYTES must be at least 1024");
  }

  if (isNaN(config.polygonCountToleranceBps) || config.polygonCountToleranceBps < 0) {
    throw new Error("POLYGON_COUNT_TOLERANCE_BPS must not be negative");
  }

  if (isNaN(config.gridSize) || config.gridSize <= 0) {
    throw new Error("GRID_SIZE must be positive");
  }

  if (config.batchSize < 1 || config.batchSize > 1000) {
    throw new Error("BATCH_SIZE must be between 1 and 1000");
  }

  if (config.dedupCacheMaxEntries < 1) {
    throw new Error("DEDUP_CACHE_MAX_ENTRIES must be at least 1");
  }
}
