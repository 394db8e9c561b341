import { describe, it, expect, vi, afterEach } from "vitest";
import { PipelineCoordinator } from "../../../src/pipeline/coordinator.js";
import type { CoordinatorOptions } from "../../../src/pipeline/coordinator.js";
import { DedupCache } from "../../../src/cache/dedup-cache.js";
import { Validator } from "../../../src/validator/validator.js";
import { FetchError, SinkError } from "../../../src/errors.js";
import type { MetadataEvent, ValidatedDocument } from "../../../src/types.js";
import {
  ArraySource,
  MemoryCheckpointStore,
  MemorySink,
  StubFetcher,
  jsonBytes,
  uriEvent,
} from "../../mocks/pipeline.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
}

interface Harness {
  coordinator: PipelineCoordinator;
  source: ArraySource;
  sink: MemorySink;
  store: MemoryCheckpointStore;
  fetcher: StubFetcher;
  validator: Validator;
  cache: DedupCache<ValidatedDocument>;
}

let active: PipelineCoordinator | null = null;

function harness(
  events: MetadataEvent[],
  overrides: Partial<CoordinatorOptions> = {},
  setup: { keepOpen?: boolean; checkpoint?: bigint | null } = {}
): Harness {
  const source = new ArraySource(events, setup.keepOpen ?? false);
  const sink = new MemorySink();
  const store = new MemoryCheckpointStore(setup.checkpoint ?? null);
  const fetcher = new StubFetcher();
  const validator = new Validator({ gridSize: 100 });
  const cache = new DedupCache<ValidatedDocument>({ maxEntries: 100 });

  const coordinator = new PipelineCoordinator({
    source,
    checkpointStore: store,
    fetcher,
    validator,
    cache,
    sink,
    concurrency: 4,
    prefetch: 8,
    maxAttempts: 5,
    backoff: { baseMs: 1, factor: 1, maxMs: 1 },
    deadlineMs: 60000,
    checkpointIntervalMs: 60000,
    statsIntervalMs: 60000,
    defaultAssetClass: "token",
    random: () => 0,
    ...overrides,
  });
  active = coordinator;
  return { coordinator, source, sink, store, fetcher, validator, cache };
}

async function runToIdle(coordinator: PipelineCoordinator): Promise<void> {
  await coordinator.start();
  await coordinator.onIdle();
}

afterEach(async () => {
  if (active) {
    await active.stop();
    active = null;
  }
});

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("PipelineCoordinator", () => {
  describe("ordering", () => {
    it("should converge on the newest event despite reordering and duplicates", async () => {
      const events = [
        uriEvent("e1", "c:1", "https://meta.test/3.json", 3n),
        uriEvent("e2", "c:1", "https://meta.test/5.json", 5n),
        uriEvent("e3", "c:1", "https://meta.test/4.json", 4n),
        uriEvent("e4", "c:1", "https://meta.test/5.json", 5n),
        uriEvent("e5", "c:1", "https://meta.test/2.json", 2n),
      ];
      const { coordinator, sink, fetcher } = harness(events);
      for (const n of [2, 3, 4, 5]) {
        fetcher.on(`https://meta.test/${n}.json`, () => jsonBytes({ name: `version ${n}` }));
      }

      await runToIdle(coordinator);

      const row = sink.rows.get("c:1");
      expect(row?.observedAt).toBe(5n);
      expect(row?.record.fields).toEqual({ name: "version 5" });

      const stats = coordinator.getStats();
      expect(stats.received).toBe(5);
      expect(stats.done + stats.stale).toBe(5);
      expect(stats.quarantined).toBe(0);
    });

    it("should skip an older event without fetching when a newer one is stored", async () => {
      const { coordinator, sink, fetcher, validator } = harness([
        uriEvent("e3", "c:1", "https://meta.test/3.json", 3n),
      ]);
      fetcher.on("https://meta.test/3.json", () => jsonBytes({ name: "old" }));

      const newer = validator.validate(
        { bytes: jsonBytes({ name: "new" }), sourceUri: null, gateway: "inline", contentType: null, fetchedAt: new Date(0) },
        "token"
      );
      await sink.upsert("c:1", { ...newer, tokenId: "c:1", sourceUri: null, gateway: "inline" }, 5n, 0n);

      await runToIdle(coordinator);

      expect(fetcher.calls).toEqual([]);
      expect(sink.rows.get("c:1")?.observedAt).toBe(5n);
      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "new" });
      expect(coordinator.getStats().stale).toBe(1);
    });

    it("should count a write rejected by the sink guard as stale", async () => {
      const slow = deferred();
      const { coordinator, sink, fetcher } = harness([
        uriEvent("e6", "c:1", "https://meta.test/6.json", 6n),
        uriEvent("e7", "c:1", "https://meta.test/7.json", 7n),
      ]);
      fetcher.on("https://meta.test/6.json", async () => {
        await slow.promise;
        return jsonBytes({ name: "six" });
      });
      fetcher.on("https://meta.test/7.json", () => jsonBytes({ name: "seven" }));

      await coordinator.start();
      await vi.waitFor(() => expect(sink.rows.get("c:1")?.observedAt).toBe(7n));
      slow.release();
      await coordinator.onIdle();

      expect(sink.writes).toEqual([
        { tokenId: "c:1", observedAt: 7n, applied: true },
        { tokenId: "c:1", observedAt: 6n, applied: false },
      ]);
      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "seven" });
      const stats = coordinator.getStats();
      expect(stats.done).toBe(1);
      expect(stats.stale).toBe(1);
    });

    it("should apply a later update from the same block", async () => {
      const { coordinator, sink, fetcher } = harness(
        [
          uriEvent("e1", "c:1", "https://meta.test/first.json", 5n, { sequence: 1n }),
          uriEvent("e2", "c:1", "https://meta.test/second.json", 5n, { sequence: 2n }),
        ],
        { concurrency: 1 }
      );
      fetcher.on("https://meta.test/first.json", () => jsonBytes({ name: "first" }));
      fetcher.on("https://meta.test/second.json", () => jsonBytes({ name: "second" }));

      await runToIdle(coordinator);

      expect(fetcher.calls).toEqual(["https://meta.test/first.json", "https://meta.test/second.json"]);
      expect(sink.rows.get("c:1")).toMatchObject({ observedAt: 5n, sequence: 2n });
      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "second" });
      expect(coordinator.getStats().done).toBe(2);
    });

    it("should keep the later same-block update when the earlier one arrives last", async () => {
      const { coordinator, sink, fetcher } = harness(
        [
          uriEvent("e2", "c:1", "https://meta.test/second.json", 5n, { sequence: 2n }),
          uriEvent("e1", "c:1", "https://meta.test/first.json", 5n, { sequence: 1n }),
        ],
        { concurrency: 1 }
      );
      fetcher.on("https://meta.test/first.json", () => jsonBytes({ name: "first" }));
      fetcher.on("https://meta.test/second.json", () => jsonBytes({ name: "second" }));

      await runToIdle(coordinator);

      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "second" });
      expect(sink.writes).toEqual([
        { tokenId: "c:1", observedAt: 5n, applied: true },
        { tokenId: "c:1", observedAt: 5n, applied: false },
      ]);
      const stats = coordinator.getStats();
      expect(stats.done).toBe(1);
      expect(stats.stale).toBe(1);
    });
  });

  describe("fetch coalescing", () => {
    it("should fetch a URI once for concurrent events of different tokens", async () => {
      const gate = deferred();
      const events = [1n, 2n, 3n].map((n) => uriEvent(`e${n}`, `c:${n}`, "https://meta.test/shared.json", n));
      const { coordinator, sink, fetcher } = harness(events);
      fetcher.on("https://meta.test/shared.json", async () => {
        await gate.promise;
        return jsonBytes({ name: "shared" });
      });

      await coordinator.start();
      await vi.waitFor(() => expect(coordinator.getStats().fetchesJoined).toBe(2));
      gate.release();
      await coordinator.onIdle();

      expect(fetcher.calls).toEqual(["https://meta.test/shared.json"]);
      expect(coordinator.getStats().fetchesJoined).toBe(2);
      expect([...sink.rows.keys()].sort()).toEqual(["c:1", "c:2", "c:3"]);
      for (const tokenId of ["c:1", "c:2", "c:3"]) {
        expect(sink.rows.get(tokenId)?.record).toMatchObject({
          tokenId,
          sourceUri: "https://meta.test/shared.json",
          fields: { name: "shared" },
        });
      }
      expect(coordinator.getStats().done).toBe(3);
    });

    it("should fetch again once the shared fetch has settled", async () => {
      const { coordinator, fetcher } = harness(
        [
          uriEvent("e1", "c:1", "https://meta.test/shared.json", 1n),
          uriEvent("e2", "c:2", "https://meta.test/shared.json", 2n),
        ],
        { concurrency: 1 }
      );
      fetcher.on("https://meta.test/shared.json", () => jsonBytes({ name: "shared" }));

      await runToIdle(coordinator);

      expect(fetcher.calls).toHaveLength(2);
      expect(coordinator.getStats().fetchesJoined).toBe(0);
    });
  });

  describe("dedup", () => {
    it("should validate identical bytes once for different tokens", async () => {
      const { coordinator, sink, fetcher, validator } = harness([
        uriEvent("e1", "c:1", "https://meta.test/a.json", 1n),
        uriEvent("e2", "c:2", "https://meta.test/b.json", 1n),
      ]);
      const bytes = jsonBytes({ name: "shared" });
      fetcher.on("https://meta.test/a.json", () => bytes);
      fetcher.on("https://meta.test/b.json", () => bytes);
      const validateSpy = vi.spyOn(validator, "validate");

      await runToIdle(coordinator);

      expect(validateSpy).toHaveBeenCalledTimes(1);
      const first = sink.rows.get("c:1")?.record;
      const second = sink.rows.get("c:2")?.record;
      expect(first?.fingerprint).toBe(second?.fingerprint);
      expect(first?.sourceUri).toBe("https://meta.test/a.json");
      expect(second?.sourceUri).toBe("https://meta.test/b.json");
    });

    it("should use the event's asset class for validation", async () => {
      const { coordinator, sink, fetcher } = harness([
        uriEvent("e1", "c:1", "https://meta.test/f.json", 1n, { assetClass: "fungible" }),
      ]);
      fetcher.on("https://meta.test/f.json", () => jsonBytes({ name: "Coin", symbol: "CN", decimals: 6 }));

      await runToIdle(coordinator);

      const record = sink.rows.get("c:1")?.record;
      expect(record?.assetClass).toBe("fungible");
      expect(record?.schemaVersion).toBe("fungible@1");
      expect(record?.validity).toEqual({ status: "valid" });
    });

    it("should persist unparseable metadata as invalid", async () => {
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/x.json", 1n)]);
      fetcher.on("https://meta.test/x.json", () => new TextEncoder().encode("[1, 2"));

      await runToIdle(coordinator);

      expect(sink.rows.get("c:1")?.record.validity.status).toBe("invalid");
      expect(coordinator.getStats().done).toBe(1);
    });
  });

  describe("event states", () => {
    it("should report an event waiting on another's validation as caching", async () => {
      const gate = deferred();
      const { coordinator, sink, fetcher } = harness(
        [
          uriEvent("e1", "c:1", "https://meta.test/a.json", 1n),
          uriEvent("e2", "c:2", "https://meta.test/b.json", 2n),
        ],
        {
          artifactVerifier: {
            verify: async (document: ValidatedDocument) => {
              await gate.promise;
              return document;
            },
          },
        }
      );
      const bytes = jsonBytes({ name: "same" });
      fetcher.on("https://meta.test/a.json", () => bytes);
      fetcher.on("https://meta.test/b.json", () => bytes);

      await coordinator.start();
      await vi.waitFor(() => expect(coordinator.getStats().active).toEqual({ validating: 1, caching: 1 }));
      gate.release();
      await coordinator.onIdle();

      expect(coordinator.getStats().active).toEqual({});
      expect(sink.rows.get("c:1")?.record.fingerprint).toBe(sink.rows.get("c:2")?.record.fingerprint);
      expect(coordinator.getStats().cache).toMatchObject({ misses: 1, joined: 1 });
    });

    it("should report events waiting for a retry as retry_wait", async () => {
      const { coordinator, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/flaky.json", 1n)], {
        backoff: { baseMs: 60000, factor: 1, maxMs: 60000 },
      });
      fetcher.on("https://meta.test/flaky.json", () => {
        throw new FetchError("unavailable", "HTTP 503");
      });

      await coordinator.start();
      await vi.waitFor(() => expect(coordinator.getStats().active).toEqual({ retry_wait: 1 }));
    });
  });

  describe("artifact verification", () => {
    it("should store the verified document", async () => {
      const verify = vi.fn(async (document: ValidatedDocument): Promise<ValidatedDocument> => ({
        ...document,
        derived: { ...document.derived, countedPolygons: 12 },
      }));
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/a.json", 1n)], {
        artifactVerifier: { verify },
      });
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));

      await runToIdle(coordinator);

      expect(verify).toHaveBeenCalledTimes(1);
      expect(sink.rows.get("c:1")?.record.derived).toEqual({ countedPolygons: 12 });
    });

    it("should retry when the artifact is temporarily unavailable and not cache the failure", async () => {
      let calls = 0;
      const verify = vi.fn(async (document: ValidatedDocument): Promise<ValidatedDocument> => {
        calls++;
        if (calls === 1) throw new FetchError("gateway_exhausted", "All 2 ipfs gateways failed");
        return document;
      });
      const { coordinator, sink, fetcher, validator } = harness([uriEvent("e1", "c:1", "https://meta.test/a.json", 1n)], {
        artifactVerifier: { verify },
      });
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));
      const validateSpy = vi.spyOn(validator, "validate");

      await runToIdle(coordinator);

      expect(verify).toHaveBeenCalledTimes(2);
      expect(validateSpy).toHaveBeenCalledTimes(2);
      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "a" });
      const stats = coordinator.getStats();
      expect(stats.retried).toBe(1);
      expect(stats.done).toBe(1);
    });
  });

  describe("retries and quarantine", () => {
    it("should quarantine after maxAttempts retryable failures while other events proceed", async () => {
      const { coordinator, sink, fetcher } = harness([
        uriEvent("bad", "c:1", "ipfs://bad", 1n),
        uriEvent("good", "c:2", "https://meta.test/ok.json", 2n),
      ]);
      fetcher.on("ipfs://bad", () => {
        throw new FetchError("gateway_exhausted", "All 2 ipfs gateways failed");
      });
      fetcher.on("https://meta.test/ok.json", () => jsonBytes({ name: "ok" }));

      await runToIdle(coordinator);

      expect(fetcher.calls.filter((uri) => uri === "ipfs://bad")).toHaveLength(5);
      expect(sink.rows.has("c:1")).toBe(false);
      expect(sink.rows.get("c:2")?.observedAt).toBe(2n);
      expect(sink.quarantined).toHaveLength(1);
      expect(sink.quarantined[0]).toMatchObject({
        eventId: "bad",
        tokenId: "c:1",
        observedAt: 1n,
        sourceUri: "ipfs://bad",
        errorKind: "gateway_exhausted",
        errorMessage: "All 2 ipfs gateways failed (after 5 attempts)",
        attempts: 5,
      });

      const stats = coordinator.getStats();
      expect(stats.retried).toBe(4);
      expect(stats.quarantined).toBe(1);
      expect(stats.done).toBe(1);
      expect(stats.retryQueueSize).toBe(0);
    });

    it("should quarantine a fatal error on the first attempt", async () => {
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/gone.json", 1n)]);
      fetcher.on("https://meta.test/gone.json", () => {
        throw new FetchError("not_found", "HTTP 404: https://meta.test/gone.json", { status: 404 });
      });

      await runToIdle(coordinator);

      expect(fetcher.calls).toEqual(["https://meta.test/gone.json"]);
      expect(sink.quarantined).toHaveLength(1);
      expect(sink.quarantined[0].errorKind).toBe("not_found");
      expect(sink.quarantined[0].attempts).toBe(1);
      expect(coordinator.getStats().retried).toBe(0);
    });

    it("should quarantine when the next retry would pass the deadline", async () => {
      const clock = { now: 1000 };
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/slow.json", 1n)], {
        now: () => clock.now,
        deadlineMs: 1000,
        backoff: { baseMs: 5000, factor: 1, maxMs: 5000 },
      });
      fetcher.on("https://meta.test/slow.json", () => {
        throw new FetchError("unavailable", "HTTP 503");
      });

      await runToIdle(coordinator);

      expect(sink.quarantined).toHaveLength(1);
      expect(sink.quarantined[0]).toMatchObject({
        errorKind: "deadline_exceeded",
        errorMessage: "unavailable: HTTP 503",
        attempts: 1,
        firstSeenAt: new Date(1000),
        quarantinedAt: new Date(1000),
      });
    });

    it("should retry a transient sink failure", async () => {
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/a.json", 1n)]);
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));
      sink.upsertFailures.push(new SinkError("transient", "connection reset"));

      await runToIdle(coordinator);

      expect(sink.rows.get("c:1")?.observedAt).toBe(1n);
      const stats = coordinator.getStats();
      expect(stats.retried).toBe(1);
      expect(stats.done).toBe(1);
    });

    it("should quarantine a constraint violation without retrying", async () => {
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/a.json", 1n)]);
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));
      sink.upsertFailures.push(new SinkError("constraint_violation", "value too long"));

      await runToIdle(coordinator);

      expect(sink.rows.has("c:1")).toBe(false);
      expect(sink.quarantined[0].errorKind).toBe("constraint_violation");
      expect(coordinator.getStats().retried).toBe(0);
    });

    it("should treat unknown errors as retryable", async () => {
      let calls = 0;
      const { coordinator, sink, fetcher } = harness([uriEvent("e1", "c:1", "https://meta.test/a.json", 1n)]);
      fetcher.on("https://meta.test/a.json", () => {
        calls++;
        if (calls === 1) throw new Error("socket hang up");
        return jsonBytes({ name: "a" });
      });

      await runToIdle(coordinator);

      expect(calls).toBe(2);
      expect(sink.rows.get("c:1")?.record.fields).toEqual({ name: "a" });
      expect(sink.quarantined).toEqual([]);
    });
  });

  describe("backpressure", () => {
    it("should stop pulling events while queued plus running reach prefetch", async () => {
      const gate = deferred();
      const events = [1n, 2n, 3n, 4n, 5n].map((n) => uriEvent(`e${n}`, `c:${n}`, "https://meta.test/slow.json", n));
      const { coordinator, fetcher } = harness(events, { concurrency: 1, prefetch: 2 });
      fetcher.on("https://meta.test/slow.json", async () => {
        await gate.promise;
        return jsonBytes({ name: "slow" });
      });

      await coordinator.start();
      await vi.waitFor(() => expect(coordinator.getStats().inFlight).toBe(1));
      await new Promise((resolve) => setTimeout(resolve, 20));

      const stats = coordinator.getStats();
      expect(stats.received).toBe(2);
      expect(stats.queueDepth).toBe(1);

      gate.release();
      await coordinator.onIdle();
      expect(coordinator.getStats().received).toBe(5);
      expect(coordinator.getStats().done).toBe(5);
    });
  });

  describe("checkpoint", () => {
    it("should resume from the stored checkpoint and persist the new one on stop", async () => {
      const { coordinator, source, store, fetcher } = harness(
        [
          uriEvent("e9", "c:9", "https://meta.test/a.json", 9n),
          uriEvent("e10", "c:10", "https://meta.test/a.json", 10n),
          uriEvent("e12", "c:12", "https://meta.test/a.json", 12n),
        ],
        {},
        { checkpoint: 10n }
      );
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));

      await runToIdle(coordinator);
      expect(coordinator.getStats().received).toBe(2);
      expect(coordinator.getStats().checkpoint).toBe(12n);

      await coordinator.stop();
      expect(source.requestedFrom).toEqual([10n]);
      expect(store.saved).toEqual([12n]);
    });

    it("should keep the checkpoint at an event still waiting to retry", async () => {
      const { coordinator, store, fetcher } = harness(
        [
          uriEvent("e20", "c:20", "https://meta.test/flaky.json", 20n),
          uriEvent("e21", "c:21", "https://meta.test/a.json", 21n),
        ],
        { backoff: { baseMs: 60000, factor: 1, maxMs: 60000 } }
      );
      fetcher.on("https://meta.test/flaky.json", () => {
        throw new FetchError("timeout", "Timed out after 10000ms");
      });
      fetcher.on("https://meta.test/a.json", () => jsonBytes({ name: "a" }));

      await coordinator.start();
      await vi.waitFor(() => {
        const stats = coordinator.getStats();
        expect(stats.retryQueueSize).toBe(1);
        expect(stats.done).toBe(1);
      });
      expect(coordinator.getStats().checkpoint).toBe(20n);

      await coordinator.stop();
      expect(store.saved).toEqual([20n]);
      expect(coordinator.getStats().retryQueueSize).toBe(0);
    });
  });

  describe("shutdown", () => {
    it("should finish running events, drop queued ones and report not running", async () => {
      const gate = deferred();
      const events = [1n, 2n, 3n, 4n, 5n, 6n].map((n) => uriEvent(`e${n}`, `c:${n}`, "https://meta.test/slow.json", n));
      const { coordinator, sink, store, fetcher } = harness(events, { concurrency: 1, prefetch: 4 });
      fetcher.on("https://meta.test/slow.json", async () => {
        await gate.promise;
        return jsonBytes({ name: "slow" });
      });

      await coordinator.start();
      await vi.waitFor(() => expect(coordinator.getStats().received).toBe(4));
      expect(coordinator.isRunning()).toBe(true);

      const stopping = coordinator.stop();
      expect(coordinator.isRunning()).toBe(false);
      gate.release();
      await stopping;

      expect([...sink.rows.keys()]).toEqual(["c:1"]);
      const stats = coordinator.getStats();
      expect(stats.done).toBe(1);
      expect(stats.received).toBe(4);
      expect(stats.queueDepth).toBe(0);
      expect(store.saved).toEqual([2n]);
    });

    it("should resolve onIdle when stopped with work outstanding", async () => {
      const { coordinator, fetcher } = harness(
        [uriEvent("e1", "c:1", "https://meta.test/flaky.json", 1n)],
        { backoff: { baseMs: 60000, factor: 1, maxMs: 60000 } }
      );
      fetcher.on("https://meta.test/flaky.json", () => {
        throw new FetchError("unavailable", "HTTP 502");
      });

      await coordinator.start();
      const idle = coordinator.onIdle();
      await vi.waitFor(() => expect(coordinator.getStats().retryQueueSize).toBe(1));
      await coordinator.stop();

      await expect(idle).resolves.toBeUndefined();
    });
  });
});
