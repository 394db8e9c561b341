/**
 * Pipeline Coordinator - drives metadata events from the source to the sink.
 *
 * Per event: received -> fetching -> caching -> persisting -> done. While in
 * caching the event either reuses a validated document or, as the first one
 * to see its bytes, moves to validating until the document is built.
 * Retryable failures loop back to fetching after backoff; stale and
 * quarantined are the other terminal outcomes.
 *
 * Uses p-queue as the worker pool:
 * - `concurrency` events are processed at once
 * - the pump stops pulling from the source while queued + running >= prefetch
 * - retries wait on their own timers, outside the queue
 */

import PQueue from "p-queue";
import { createChildLogger } from "../logger.js";
import { classifyError } from "../errors.js";
import { STATS_LOG_INTERVAL_MS } from "../constants.js";
import { SingleFlight } from "../cache/single-flight.js";
import { fingerprintOf } from "../validator/fingerprint.js";
import { computeBackoff } from "./backoff.js";
import { CheckpointTracker } from "./checkpoint.js";
import type { BackoffPolicy } from "./backoff.js";
import type { DedupCache, DedupCacheStats } from "../cache/dedup-cache.js";
import type { Fetcher } from "../fetcher/fetcher.js";
import type { Validator } from "../validator/validator.js";
import type { ArtifactVerifier } from "../validator/artifact.js";
import type { CheckpointStore, MetadataSink, QuarantineEntry } from "../sink/types.js";
import type { EventSource } from "../source/types.js";
import type { PipelineErrorKind } from "../errors.js";
import type { AssetClass, MetadataEvent, NormalizedRecord, RawPayload, ValidatedDocument } from "../types.js";

const logger = createChildLogger("coordinator");

export type MetadataFetcher = Pick<Fetcher, "resolve" | "sourceKey">;

export type EventState =
  | "received"
  | "fetching"
  | "caching"
  | "validating"
  | "persisting"
  | "retry_wait"
  | "done"
  | "stale"
  | "quarantined";

export interface RetryState {
  attemptCount: number;
  nextEligibleTime: number | null;
  lastErrorKind: PipelineErrorKind | null;
}

interface EventTask {
  event: MetadataEvent;
  assetClass: AssetClass;
  state: EventState;
  firstSeenAt: number;
  retry: RetryState;
}

export interface CoordinatorOptions {
  source: EventSource;
  checkpointStore: CheckpointStore;
  fetcher: MetadataFetcher;
  validator: Validator;
  /** Checks item artifacts against their metadata before a document is cached */
  artifactVerifier?: Pick<ArtifactVerifier, "verify">;
  cache: DedupCache<ValidatedDocument>;
  sink: MetadataSink;
  concurrency: number;
  prefetch: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
  /** Quarantine an event whose next retry would land later than this after first receipt */
  deadlineMs: number;
  checkpointIntervalMs: number;
  defaultAssetClass: AssetClass;
  statsIntervalMs?: number;
  now?: () => number;
  random?: () => number;
}

export interface CoordinatorStats {
  received: number;
  done: number;
  stale: number;
  retried: number;
  quarantined: number;
  queueDepth: number;
  inFlight: number;
  retryQueueSize: number;
  fetchesJoined: number;
  /** Unsettled events by current state */
  active: Partial<Record<EventState, number>>;
  checkpoint: bigint | null;
  cache: DedupCacheStats;
}

export class PipelineCoordinator {
  private readonly options: CoordinatorOptions;
  private readonly queue: PQueue;
  private readonly fetches = new SingleFlight<string, RawPayload>();
  private readonly retryTimers = new Set<ReturnType<typeof setTimeout>>();
  private readonly tasks = new Set<EventTask>();
  private readonly now: () => number;
  private readonly random: () => number;

  private tracker = new CheckpointTracker();
  private lastSavedCheckpoint: bigint | null = null;
  private running = false;
  private stopping = false;
  private pumpDone: Promise<void> = Promise.resolve();
  private capacityWaiter: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private statsInterval: ReturnType<typeof setInterval> | null = null;
  private checkpointInterval: ReturnType<typeof setInterval> | null = null;

  private stats = {
    received: 0,
    done: 0,
    stale: 0,
    retried: 0,
    quarantined: 0,
  };

  constructor(options: CoordinatorOptions) {
    this.options = options;
    this.queue = new PQueue({ concurrency: options.concurrency });
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.warn("Coordinator already running");
      return;
    }

    const checkpoint = await this.options.checkpointStore.load();
    this.tracker = new CheckpointTracker(checkpoint);
    this.lastSavedCheckpoint = checkpoint;
    this.running = true;
    this.stopping = false;

    logger.info(
      {
        checkpoint: checkpoint?.toString() ?? null,
        concurrency: this.options.concurrency,
        prefetch: this.options.prefetch,
      },
      "Starting pipeline coordinator"
    );

    this.statsInterval = setInterval(() => this.logStats(), this.options.statsIntervalMs ?? STATS_LOG_INTERVAL_MS);
    this.checkpointInterval = setInterval(() => {
      this.flushCheckpoint().catch((error) => {
        logger.warn({ error: error instanceof Error ? error.message : String(error) }, "Checkpoint save failed");
      });
    }, this.options.checkpointIntervalMs);

    this.pumpDone = this.pump(this.options.source.events(checkpoint)).catch((error) => {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, "Event source failed");
    });
  }

  /**
   * Stop pulling, drop queued work and pending retries (they stay below the
   * checkpoint and are redelivered after restart), let running events
   * finish, then persist the checkpoint.
   */
  async stop(): Promise<void> {
    if (!this.running || this.stopping) return;
    this.stopping = true;

    const dropped = this.queue.size + this.retryTimers.size;
    logger.info({ dropped, running: this.queue.pending }, "Stopping pipeline coordinator");

    this.options.source.close();
    this.capacityWaiter?.();

    for (const timer of this.retryTimers) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    this.queue.clear();

    await this.pumpDone;
    await this.queue.onIdle();
    // Whatever is left was dropped and will be redelivered
    this.tasks.clear();

    if (this.statsInterval) {
      clearInterval(this.statsInterval);
      this.statsInterval = null;
    }
    if (this.checkpointInterval) {
      clearInterval(this.checkpointInterval);
      this.checkpointInterval = null;
    }

    try {
      await this.flushCheckpoint();
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, "Final checkpoint save failed");
    }

    this.running = false;
    this.releaseIdleWaiters();
    this.logStats();
    logger.info("Pipeline coordinator stopped");
  }

  /**
   * Resolves once the source is exhausted and every accepted event reached
   * a terminal state, or when the coordinator stops.
   */
  async onIdle(): Promise<void> {
    await this.pumpDone;
    if (!this.running || this.tracker.pendingCount === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  isRunning(): boolean {
    return this.running && !this.stopping;
  }

  getStats(): CoordinatorStats {
    return {
      ...this.stats,
      queueDepth: this.queue.size,
      inFlight: this.queue.pending,
      retryQueueSize: this.retryTimers.size,
      fetchesJoined: this.fetches.joined,
      active: this.countActive(),
      checkpoint: this.tracker.watermark(),
      cache: this.options.cache.getStats(),
    };
  }

  private countActive(): Partial<Record<EventState, number>> {
    const counts: Partial<Record<EventState, number>> = {};
    for (const task of this.tasks) {
      counts[task.state] = (counts[task.state] ?? 0) + 1;
    }
    return counts;
  }

  private async pump(events: AsyncIterable<MetadataEvent>): Promise<void> {
    for await (const event of events) {
      if (this.stopping) break;
      this.accept(event);
      await this.waitForCapacity();
      if (this.stopping) break;
    }
    logger.debug("Event pump finished");
  }

  private hasCapacity(): boolean {
    return this.queue.size + this.queue.pending < this.options.prefetch;
  }

  private waitForCapacity(): Promise<void> {
    if (this.hasCapacity() || this.stopping) return Promise.resolve();

    return new Promise((resolve) => {
      const check = () => {
        if (this.hasCapacity() || this.stopping) {
          this.queue.off("next", check);
          this.capacityWaiter = null;
          resolve();
        }
      };
      this.capacityWaiter = check;
      this.queue.on("next", check);
    });
  }

  private accept(event: MetadataEvent): void {
    this.stats.received++;
    this.tracker.track(event.observedAt);

    const task: EventTask = {
      event,
      assetClass: event.assetClass ?? this.options.defaultAssetClass,
      state: "received",
      firstSeenAt: this.now(),
      retry: { attemptCount: 0, nextEligibleTime: null, lastErrorKind: null },
    };
    this.tasks.add(task);
    this.enqueue(task);
  }

  private enqueue(task: EventTask): void {
    this.queue.add(() => this.process(task)).catch((error) => {
      logger.error(
        { eventId: task.event.id, error: error instanceof Error ? error.message : String(error) },
        "Queue task failed"
      );
    });
  }

  private async process(task: EventTask): Promise<void> {
    task.retry.attemptCount++;
    task.retry.nextEligibleTime = null;

    try {
      const applied = await this.attempt(task);
      if (applied) {
        task.state = "done";
        this.stats.done++;
      } else {
        task.state = "stale";
        this.stats.stale++;
      }
      this.settle(task);
    } catch (error) {
      await this.handleFailure(task, error);
    }
  }

  /**
   * One pass through fetch, validate and persist.
   * Returns false when the event turned out to be stale.
   */
  private async attempt(task: EventTask): Promise<boolean> {
    const { event, assetClass } = task;

    const persisted = await this.options.sink.lastObservedAt(event.tokenId);
    // Equal observedAt goes through, the sink orders same-block updates by sequence
    if (persisted !== null && event.observedAt < persisted) {
      logger.debug(
        { tokenId: event.tokenId, observedAt: event.observedAt.toString(), persisted: persisted.toString() },
        "Skipping stale event"
      );
      return false;
    }

    task.state = "fetching";
    const payload = await this.fetch(event);

    task.state = "caching";
    const cacheKey = `${assetClass}:${fingerprintOf(payload.bytes)}`;
    const document = await this.options.cache.getOrCompute(cacheKey, async () => {
      task.state = "validating";
      const validated = this.options.validator.validate(payload, assetClass);
      return this.options.artifactVerifier ? this.options.artifactVerifier.verify(validated) : validated;
    });

    task.state = "persisting";
    const record: NormalizedRecord = {
      ...document,
      tokenId: event.tokenId,
      sourceUri: payload.sourceUri,
      gateway: payload.gateway,
    };
    const ack = await this.options.sink.upsert(event.tokenId, record, event.observedAt, event.sequence);

    if (ack.applied) {
      logger.debug(
        {
          tokenId: event.tokenId,
          observedAt: event.observedAt.toString(),
          sequence: event.sequence.toString(),
          fingerprint: document.fingerprint,
          validity: document.validity.status,
        },
        "Metadata persisted"
      );
    }
    return ack.applied;
  }

  private fetch(event: MetadataEvent): Promise<RawPayload> {
    const key = this.options.fetcher.sourceKey(event.source);
    if (key === null) {
      return this.options.fetcher.resolve(event.source);
    }
    return this.fetches.run(key, () => this.options.fetcher.resolve(event.source));
  }

  private async handleFailure(task: EventTask, error: unknown): Promise<void> {
    const { kind, retryable, message } = classifyError(error);
    const attempts = task.retry.attemptCount;
    task.retry.lastErrorKind = kind;

    if (!retryable) {
      await this.quarantine(task, kind, message);
      return;
    }
    if (attempts >= this.options.maxAttempts) {
      await this.quarantine(task, kind, `${message} (after ${attempts} attempts)`);
      return;
    }

    const delay = computeBackoff(attempts, this.options.backoff, this.random);
    const nextEligibleTime = this.now() + delay;
    if (nextEligibleTime - task.firstSeenAt > this.options.deadlineMs) {
      await this.quarantine(task, "deadline_exceeded", `${kind}: ${message}`);
      return;
    }

    // Left unsettled: the event is redelivered from the checkpoint after restart
    if (this.stopping) return;

    task.state = "retry_wait";
    task.retry.nextEligibleTime = nextEligibleTime;
    this.stats.retried++;
    logger.warn(
      { eventId: task.event.id, tokenId: task.event.tokenId, kind, attempts, delayMs: delay, error: message },
      "Event failed, retry scheduled"
    );

    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      if (!this.stopping) this.enqueue(task);
    }, delay);
    this.retryTimers.add(timer);
  }

  private async quarantine(
    task: EventTask,
    kind: QuarantineEntry["errorKind"],
    message: string
  ): Promise<void> {
    const { event } = task;
    task.state = "quarantined";
    this.stats.quarantined++;

    const entry: QuarantineEntry = {
      eventId: event.id,
      tokenId: event.tokenId,
      observedAt: event.observedAt,
      sourceUri: event.source.kind === "uri" ? event.source.uri : null,
      errorKind: kind,
      errorMessage: message,
      attempts: task.retry.attemptCount,
      firstSeenAt: new Date(task.firstSeenAt),
      quarantinedAt: new Date(this.now()),
    };

    logger.error(
      {
        eventId: entry.eventId,
        tokenId: entry.tokenId,
        observedAt: entry.observedAt.toString(),
        sourceUri: entry.sourceUri,
        assetClass: task.assetClass,
        kind,
        attempts: entry.attempts,
        error: message,
      },
      "Event quarantined"
    );

    try {
      await this.options.sink.recordQuarantine(entry);
    } catch (error) {
      logger.error(
        { eventId: event.id, error: error instanceof Error ? error.message : String(error) },
        "Failed to record quarantined event"
      );
    }
    this.settle(task);
  }

  private settle(task: EventTask): void {
    this.tasks.delete(task);
    this.tracker.settle(task.event.observedAt);
    if (this.tracker.pendingCount === 0) {
      this.releaseIdleWaiters();
    }
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async flushCheckpoint(): Promise<void> {
    const checkpoint = this.tracker.watermark();
    if (checkpoint === null || checkpoint === this.lastSavedCheckpoint) return;
    await this.options.checkpointStore.save(checkpoint);
    this.lastSavedCheckpoint = checkpoint;
    logger.debug({ checkpoint: checkpoint.toString() }, "Checkpoint saved");
  }

  private logStats(): void {
    const stats = this.getStats();
    logger.info(
      {
        ...this.stats,
        queueDepth: stats.queueDepth,
        inFlight: stats.inFlight,
        retryQueueSize: stats.retryQueueSize,
        active: stats.active,
        checkpoint: stats.checkpoint?.toString() ?? null,
        cache: stats.cache,
      },
      "Pipeline stats"
    );
  }
}
