import type { MetadataEvent } from "../types.js";

/**
 * Upstream feed of metadata events. Delivery is at-least-once and may
 * reorder events; the pipeline tolerates both.
 */
export interface EventSource {
  /** Events with observedAt >= `from`, or from the beginning when null */
  events(from: bigint | null): AsyncIterable<MetadataEvent>;
  close(): void;
}
