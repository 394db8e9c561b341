/**
 * Polls token_metadata_events in (observed_at, id) order.
 */

import { setTimeout as sleep } from "timers/promises";
import type { Queryable } from "../db/pool.js";
import { createChildLogger } from "../logger.js";
import { isAssetClass } from "../types.js";
import type { MetadataEvent, MetadataSource } from "../types.js";
import type { EventSource } from "./types.js";

const logger = createChildLogger("postgres-source");

const MIN_BIGINT = -(2n ** 63n);

export interface EventRow {
  id: string;
  token_id: string;
  metadata_uri: string | null;
  inline_metadata: Buffer | null;
  asset_class: string | null;
  observed_at: string;
}

export interface PostgresEventSourceOptions {
  pollIntervalMs: number;
  batchSize: number;
}

export function rowToEvent(row: EventRow): MetadataEvent {
  const source: MetadataSource = row.inline_metadata
    ? { kind: "inline", bytes: new Uint8Array(row.inline_metadata) }
    : { kind: "uri", uri: row.metadata_uri ?? "" };

  let assetClass: MetadataEvent["assetClass"];
  if (row.asset_class !== null) {
    if (isAssetClass(row.asset_class)) {
      assetClass = row.asset_class;
    } else {
      logger.warn({ eventId: row.id, assetClass: row.asset_class }, "Unknown asset class, using default");
    }
  }

  return {
    id: row.id,
    tokenId: row.token_id,
    source,
    observedAt: BigInt(row.observed_at),
    // Rows are read in (observed_at, id) order, so id orders same-block updates
    sequence: BigInt(row.id),
    assetClass,
  };
}

export class PostgresEventSource implements EventSource {
  private readonly controller = new AbortController();

  constructor(
    private readonly pool: Queryable,
    private readonly options: PostgresEventSourceOptions
  ) {}

  async *events(from: bigint | null): AsyncGenerator<MetadataEvent> {
    // (from, 0) sorts before every row at `from`, so restarts include it
    let cursor = { observedAt: from ?? MIN_BIGINT, id: 0n };
    logger.info({ from: from?.toString() ?? null }, "Event source started");

    while (!this.controller.signal.aborted) {
      let rows: EventRow[];
      try {
        const result = await this.pool.query<EventRow>(
          `SELECT id, token_id, metadata_uri, inline_metadata, asset_class, observed_at
           FROM token_metadata_events
           WHERE (observed_at, id) > ($1, $2)
           ORDER BY observed_at, id
           LIMIT $3`,
          [cursor.observedAt.toString(), cursor.id.toString(), this.options.batchSize]
        );
        rows = result.rows;
      } catch (error) {
        logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          "Event poll failed, retrying"
        );
        await this.pause();
        continue;
      }

      for (const row of rows) {
        if (this.controller.signal.aborted) return;
        cursor = { observedAt: BigInt(row.observed_at), id: BigInt(row.id) };
        yield rowToEvent(row);
      }

      if (rows.length < this.options.batchSize) {
        await this.pause();
      }
    }
  }

  close(): void {
    this.controller.abort();
  }

  private async pause(): Promise<void> {
    try {
      await sleep(this.options.pollIntervalMs, undefined, { signal: this.controller.signal });
    } catch (error) {
      if (!this.controller.signal.aborted) throw error;
    }
  }
}
