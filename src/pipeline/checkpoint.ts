/**
 * Low watermark over events the pipeline has accepted.
 *
 * Every event observed at or before the watermark is settled (stored,
 * skipped as stale or quarantined), so a restart may resume from it and
 * only ever replays events, never skips them.
 */
export class CheckpointTracker {
  private readonly pending = new Map<bigint, number>();
  private maxSeen: bigint | null;

  constructor(initial: bigint | null = null) {
    this.maxSeen = initial;
  }

  track(observedAt: bigint): void {
    this.pending.set(observedAt, (this.pending.get(observedAt) ?? 0) + 1);
    if (this.maxSeen === null || observedAt > this.maxSeen) {
      this.maxSeen = observedAt;
    }
  }

  settle(observedAt: bigint): void {
    const count = this.pending.get(observedAt);
    if (count === undefined) return;
    if (count <= 1) {
      this.pending.delete(observedAt);
    } else {
      this.pending.set(observedAt, count - 1);
    }
  }

  get pendingCount(): number {
    let total = 0;
    for (const count of this.pending.values()) total += count;
    return total;
  }

  /**
   * Smallest unsettled observedAt, or the largest seen when nothing is pending.
   * Resuming at `observedAt >= watermark` replays the unsettled ones.
   */
  watermark(): bigint | null {
    let min: bigint | null = null;
    for (const observedAt of this.pending.keys()) {
      if (min === null || observedAt < min) min = observedAt;
    }
    return min ?? this.maxSeen;
  }
}
