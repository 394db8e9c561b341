/**
 * Domain types shared by the fetcher, validator, coordinator and sink.
 */

export const ASSET_CLASSES = ["token", "fungible", "item", "place", "collection"] as const;
export type AssetClass = (typeof ASSET_CLASSES)[number];

export function isAssetClass(value: unknown): value is AssetClass {
  return ASSET_CLASSES.some((assetClass) => assetClass === value);
}

export type MetadataSource =
  | { kind: "uri"; uri: string }
  | { kind: "inline"; bytes: Uint8Array };

/**
 * A token-metadata update as emitted by the indexer.
 * May be delivered more than once and out of order.
 */
export interface MetadataEvent {
  id: string;
  tokenId: string;
  source: MetadataSource;
  observedAt: bigint;
  /** Order among events sharing observedAt (row id, log index); the later one wins */
  sequence: bigint;
  assetClass?: AssetClass;
}

export interface RawPayload {
  bytes: Uint8Array;
  sourceUri: string | null;
  /** Gateway base URL, "direct" for plain HTTP(S), "inline" when no I/O happened */
  gateway: string;
  contentType: string | null;
  fetchedAt: Date;
}

/** `sha256:<hex>` of the raw payload bytes */
export type ContentFingerprint = `sha256:${string}`;

export type DefectProblem = "missing" | "malformed" | "inconsistent";

export interface FieldDefect {
  field: string;
  problem: DefectProblem;
  message?: string;
}

export type InvalidReason = "parse_error" | "not_an_object";

export type Validity =
  | { status: "valid" }
  | { status: "partially_valid"; defects: FieldDefect[] }
  | { status: "invalid"; reason: InvalidReason; detail: string };

export type ValidityStatus = Validity["status"];

/**
 * Result of validating one payload. Shared by every token whose
 * metadata bytes (and asset class) are identical.
 */
export interface ValidatedDocument {
  fingerprint: ContentFingerprint;
  schemaVersion: string;
  assetClass: AssetClass;
  /** Canonical fields exactly as parsed; malformed ones are left out */
  fields: Record<string, unknown>;
  /** Values computed from the canonical fields (normalized tags, grid hash, ...) */
  derived: Record<string, unknown>;
  /** Keys the schema family does not know, kept verbatim */
  extensions: Record<string, unknown>;
  validity: Validity;
  byteLength: number;
}

export interface NormalizedRecord extends ValidatedDocument {
  tokenId: string;
  sourceUri: string | null;
  gateway: string;
}

export interface GatewayConfig {
  baseUrl: string;
  timeoutMs: number;
}
