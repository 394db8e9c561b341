import type { NormalizedRecord } from "../types.js";
import type { PipelineErrorKind } from "../errors.js";

export interface SinkAck {
  tokenId: string;
  observedAt: bigint;
  /** False when the stored row is already at the same or a newer version */
  applied: boolean;
}

export interface QuarantineEntry {
  eventId: string;
  tokenId: string;
  observedAt: bigint;
  sourceUri: string | null;
  errorKind: PipelineErrorKind | "deadline_exceeded";
  errorMessage: string;
  attempts: number;
  firstSeenAt: Date;
  quarantinedAt: Date;
}

/**
 * Datastore boundary. Implementations must make `upsert` a single
 * conditional write so concurrent writers for one token cannot lose updates.
 */
export interface MetadataSink {
  /** Applies only over a stored row with an older (observedAt, sequence) */
  upsert(tokenId: string, record: NormalizedRecord, observedAt: bigint, sequence: bigint): Promise<SinkAck>;
  lastObservedAt(tokenId: string): Promise<bigint | null>;
  recordQuarantine(entry: QuarantineEntry): Promise<void>;
}

export interface CheckpointStore {
  load(): Promise<bigint | null>;
  save(checkpoint: bigint): Promise<void>;
}
