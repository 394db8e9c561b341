import { createHash } from "crypto";
import type { ContentFingerprint } from "../types.js";

/**
 * Content fingerprint of raw payload bytes (not of the parsed document),
 * so byte-identical payloads always share one fingerprint.
 */
export function fingerprintOf(bytes: Uint8Array): ContentFingerprint {
  return `sha256:${createHash("sha256").update(bytes).digest("hex")}`;
}
