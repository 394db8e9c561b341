/**
 * PostgreSQL sink - one row per token in token_metadata.
 *
 * Monotonicity is enforced by the database: the upsert only overwrites a row
 * whose (observed_at, event_sequence) is strictly older, so concurrent writers
 * for the same token converge on the newest event without in-process locking.
 */

import { readFile } from "fs/promises";
import type { QueryResultRow } from "pg";
import type { Queryable } from "../db/pool.js";
import { createChildLogger } from "../logger.js";
import { SinkError } from "../errors.js";
import { toJsonb } from "../utils/sanitize.js";
import type { NormalizedRecord } from "../types.js";
import type { CheckpointStore, MetadataSink, QuarantineEntry, SinkAck } from "./types.js";

const logger = createChildLogger("postgres-sink");

const SCHEMA_FILE = new URL("../../sql/schema.sql", import.meta.url);

/**
 * SQLSTATE classes that will fail again on retry:
 * 22 data exception, 23 integrity constraint violation.
 */
const PERMANENT_SQLSTATE_CLASSES = new Set(["22", "23"]);

function sqlState(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toSinkError(error: unknown, operation: string): SinkError {
  const code = sqlState(error);
  const message = `${operation} failed: ${error instanceof Error ? error.message : String(error)}`;
  if (code && PERMANENT_SQLSTATE_CLASSES.has(code.slice(0, 2))) {
    return new SinkError("constraint_violation", message, { cause: error });
  }
  return new SinkError("transient", message, { cause: error });
}

function cleanText(value: string | null): string | null {
  return value === null ? null : value.replace(/\u0000/g, "");
}

async function run<R extends QueryResultRow>(
  pool: Queryable,
  operation: string,
  sql: string,
  params: unknown[]
): Promise<R[]> {
  try {
    const result = await pool.query<R>(sql, params);
    return result.rows;
  } catch (error) {
    throw toSinkError(error, operation);
  }
}

export async function ensureSchema(pool: Queryable): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, "utf8");
  await pool.query(ddl);
  logger.info("Database schema ensured");
}

export class PostgresSink implements MetadataSink {
  constructor(private readonly pool: Queryable) {}

  async upsert(tokenId: string, record: NormalizedRecord, observedAt: bigint, sequence: bigint): Promise<SinkAck> {
    const validity = record.validity;
    const defects = validity.status === "partially_valid" ? validity.defects : [];
    const invalidReason = validity.status === "invalid" ? `${validity.reason}: ${validity.detail}` : null;

    const rows = await run<{ token_id: string }>(
      this.pool,
      "upsert",
      `INSERT INTO token_metadata (
         token_id, fingerprint, schema_version, asset_class, validity, defects, invalid_reason,
         fields, derived, extensions, byte_length, source_uri, gateway, observed_at, event_sequence,
         updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, NOW())
       ON CONFLICT (token_id) DO UPDATE SET
         fingerprint = EXCLUDED.fingerprint,
         schema_version = EXCLUDED.schema_version,
         asset_class = EXCLUDED.asset_class,
         validity = EXCLUDED.validity,
         defects = EXCLUDED.defects,
         invalid_reason = EXCLUDED.invalid_reason,
         fields = EXCLUDED.fields,
         derived = EXCLUDED.derived,
         extensions = EXCLUDED.extensions,
         byte_length = EXCLUDED.byte_length,
         source_uri = EXCLUDED.source_uri,
         gateway = EXCLUDED.gateway,
         observed_at = EXCLUDED.observed_at,
         event_sequence = EXCLUDED.event_sequence,
         updated_at = NOW()
       WHERE (token_metadata.observed_at, token_metadata.event_sequence)
           < (EXCLUDED.observed_at, EXCLUDED.event_sequence)
       RETURNING token_id`,
      [
        tokenId,
        record.fingerprint,
        record.schemaVersion,
        record.assetClass,
        validity.status,
        toJsonb(defects),
        cleanText(invalidReason),
        toJsonb(record.fields),
        toJsonb(record.derived),
        toJsonb(record.extensions),
        record.byteLength,
        cleanText(record.sourceUri),
        record.gateway,
        observedAt.toString(),
        sequence.toString(),
      ]
    );

    const applied = rows.length > 0;
    logger.debug(
      { tokenId, observedAt: observedAt.toString(), sequence: sequence.toString(), fingerprint: record.fingerprint, applied },
      applied ? "Metadata stored" : "Stored metadata is newer, write skipped"
    );
    return { tokenId, observedAt, applied };
  }

  async lastObservedAt(tokenId: string): Promise<bigint | null> {
    const rows = await run<{ observed_at: string }>(
      this.pool,
      "lastObservedAt",
      `SELECT observed_at FROM token_metadata WHERE token_id = $1`,
      [tokenId]
    );
    return rows.length > 0 ? BigInt(rows[0].observed_at) : null;
  }

  async recordQuarantine(entry: QuarantineEntry): Promise<void> {
    await run(
      this.pool,
      "recordQuarantine",
      `INSERT INTO metadata_quarantine (
         event_id, token_id, observed_at, source_uri, error_kind, error_message,
         attempts, first_seen_at, quarantined_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (event_id) DO UPDATE SET
         error_kind = EXCLUDED.error_kind,
         error_message = EXCLUDED.error_message,
         attempts = EXCLUDED.attempts,
         quarantined_at = EXCLUDED.quarantined_at`,
      [
        entry.eventId,
        entry.tokenId,
        entry.observedAt.toString(),
        cleanText(entry.sourceUri),
        entry.errorKind,
        cleanText(entry.errorMessage),
        entry.attempts,
        entry.firstSeenAt.toISOString(),
        entry.quarantinedAt.toISOString(),
      ]
    );
  }
}

/**
 * Checkpoint row in processor_state. Never moves backwards, even if two
 * processes share the row.
 */
export class PostgresCheckpointStore implements CheckpointStore {
  constructor(
    private readonly pool: Queryable,
    private readonly processorId = "main"
  ) {}

  async load(): Promise<bigint | null> {
    const rows = await run<{ checkpoint: string | null }>(
      this.pool,
      "loadCheckpoint",
      `SELECT checkpoint FROM processor_state WHERE id = $1`,
      [this.processorId]
    );
    const value = rows[0]?.checkpoint;
    return value === undefined || value === null ? null : BigInt(value);
  }

  async save(checkpoint: bigint): Promise<void> {
    await run(
      this.pool,
      "saveCheckpoint",
      `INSERT INTO processor_state (id, checkpoint, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (id) DO UPDATE SET
         checkpoint = EXCLUDED.checkpoint,
         updated_at = NOW()
       WHERE processor_state.checkpoint IS NULL OR processor_state.checkpoint < EXCLUDED.checkpoint`,
      [this.processorId, checkpoint.toString()]
    );
  }
}
