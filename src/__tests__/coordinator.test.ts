/**
 * End-to-end ingestion tests over the in-memory stack: dedup, reference
 * counts across runs, historical resolution, failures and cancellation.
 */
import { AlreadyRunningError } from "../errors.js";
import type { IpcEvent } from "../ipc.js";
import type { SourceRecord } from "../types.js";
import { fetched, ident, makeStack, streamOf } from "./helpers.js";
import type { TestStack } from "./helpers.js";

let stack: TestStack;

beforeEach(() => {
  stack = makeStack();
});

afterEach(() => {
  stack.db.close();
});

const M1 = ident("T1", "B1", "M1");

describe("IngestionCoordinator scenario", () => {
  it("tracks one message through ingest, re-ingest, update and deletion", async () => {
    const { coordinator, store, index, snapshots, clock } = stack;

    const r1 = await coordinator.run("T1", streamOf([fetched(M1, "version one")]));
    const d1 = store.hash(Buffer.from("version one"));
    expect(r1).toMatchObject({ status: "complete", itemsProcessed: 1, itemsSkipped: 0 });
    expect(snapshots.resolve(r1.snapshotId, M1)).toBe(d1);
    expect(snapshots.countItems(r1.snapshotId)).toBe(1);
    expect(store.stat(d1)?.refCount).toBe(1);

    clock.advance(1_000);
    const r2 = await coordinator.run("T1", streamOf([fetched(M1, "version one")]));
    expect(r2.status).toBe("complete");
    expect(store.stat(d1)?.refCount).toBe(1);
    expect(snapshots.resolve(r2.snapshotId, M1)).toBe(d1);

    clock.advance(1_000);
    const r3 = await coordinator.run("T1", streamOf([fetched(M1, "version two")]));
    const d2 = store.hash(Buffer.from("version two"));
    expect(r3.status).toBe("complete");
    expect(store.stat(d1)?.refCount).toBe(0);
    expect(store.stat(d2)?.refCount).toBe(1);
    expect(snapshots.resolve(r3.snapshotId, M1)).toBe(d2);
    expect(snapshots.resolve(r1.snapshotId, M1)).toBe(d1);
    expect(snapshots.resolve(r2.snapshotId, M1)).toBe(d1);

    clock.advance(1_000);
    const r4 = await coordinator.run("T1", streamOf<SourceRecord>([{ ...M1, status: "deleted" }]));
    expect(r4).toMatchObject({ status: "complete", itemsTombstoned: 1 });
    expect(store.stat(d2)?.refCount).toBe(1);
    expect(index.lookup(M1).tombstonedAt).not.toBeNull();
    expect(index.listMailbox("T1", "B1")).toEqual([]);
    expect([...index.listForSnapshot("T1", clock.now())]).toEqual([]);
    expect(snapshots.resolve(r3.snapshotId, M1)).toBe(d2);
  });

  it("stores byte-identical content of two identities once with two references", async () => {
    const records = [fetched(ident("T1", "B1", "a"), "same body"), fetched(ident("T1", "B2", "b"), "same body")];
    const result = await stack.coordinator.run("T1", streamOf(records));

    const digest = stack.store.hash(Buffer.from("same body"));
    expect(result.itemsProcessed).toBe(2);
    expect(stack.store.stat(digest)?.refCount).toBe(2);
    expect(stack.storage.writes).toBe(1);
  });

  it("moves one reference when a tenant run and an all run update the same item together", async () => {
    const { coordinator, store, index, clock } = stack;
    await coordinator.run("T1", streamOf([fetched(M1, "version one")]));
    const d1 = store.hash(Buffer.from("version one"));
    const d2 = store.hash(Buffer.from("version two"));

    clock.advance(1_000);
    const [tenantRun, allRun] = await Promise.all([
      coordinator.run("T1", streamOf([fetched(M1, "version two")])),
      coordinator.run("all", streamOf([fetched(M1, "version two")])),
    ]);

    expect(tenantRun).toMatchObject({ status: "complete", itemsProcessed: 1, itemsSkipped: 0 });
    expect(allRun).toMatchObject({ status: "complete", itemsProcessed: 1, itemsSkipped: 0 });
    expect(store.stat(d1)?.refCount).toBe(0);
    expect(store.stat(d2)?.refCount).toBe(1);
    expect(index.lookup(M1).digest).toBe(d2);
    expect(stack.storage.blobs.size).toBe(2);
  });

  it("dedups across tenants while keeping identities apart", async () => {
    await stack.coordinator.run("T1", streamOf([fetched(ident("T1", "B1", "x"), "shared")]));
    await stack.coordinator.run("T2", streamOf([fetched(ident("T2", "B1", "x"), "shared")]));

    const digest = stack.store.hash(Buffer.from("shared"));
    expect(stack.store.stat(digest)?.refCount).toBe(2);
    expect(stack.store.totals().blobs).toBe(1);
    expect(stack.index.lookup(ident("T2", "B1", "x")).digest).toBe(digest);
  });
});

describe("IngestionCoordinator records", () => {
  it("references unchanged items without new bytes", async () => {
    const r1 = await stack.coordinator.run("T1", streamOf([fetched(M1, "body", "2026-01-01T00:00:00Z")]));
    const digest = stack.index.lookup(M1).digest;

    const unchanged: SourceRecord = { ...M1, status: "unchanged", providerModifiedAt: new Date("2026-01-01T00:00:00Z") };
    const r2 = await stack.coordinator.run("T1", streamOf([unchanged]));

    expect(r2).toMatchObject({ status: "complete", itemsProcessed: 1 });
    expect(stack.snapshots.resolve(r2.snapshotId, M1)).toBe(digest);
    expect(stack.store.stat(digest)?.refCount).toBe(1);
    expect(r1.snapshotId).not.toBe(r2.snapshotId);
  });

  it("skips an unchanged record for an item it never stored", async () => {
    const result = await stack.coordinator.run("T1", streamOf<SourceRecord>([
      { ...M1, status: "unchanged", providerModifiedAt: null },
    ]));

    expect(result).toMatchObject({ status: "complete", itemsProcessed: 0, itemsSkipped: 1 });
    expect(stack.snapshots.skipped(result.snapshotId)[0]?.reason).toContain("not indexed");
  });

  it("ignores a deletion of an unknown item", async () => {
    const result = await stack.coordinator.run("T1", streamOf<SourceRecord>([{ ...M1, status: "deleted" }]));
    expect(result).toMatchObject({ status: "complete", itemsTombstoned: 0 });
  });

  it("tombstones live entries a complete listing no longer contains", async () => {
    const m2 = ident("T1", "B1", "M2");
    await stack.coordinator.run("T1", streamOf([fetched(M1, "one"), fetched(m2, "two")]));
    stack.clock.advance(1_000);

    const result = await stack.coordinator.run("T1", streamOf([fetched(M1, "one")]), { reconcileDeletions: true });

    expect(result.itemsTombstoned).toBe(1);
    expect(stack.index.lookup(m2).tombstonedAt).not.toBeNull();
    expect(stack.index.lookup(M1).tombstonedAt).toBeNull();
  });

  it("publishes run and item events", async () => {
    const seen: string[] = [];
    stack.bus.subscribeAll((event: IpcEvent) => seen.push(event.type));

    await stack.coordinator.run("T1", streamOf([fetched(M1, "body")]));
    expect(seen).toEqual(["run:started", "item:stored", "run:completed"]);
  });
});

describe("IngestionCoordinator failures", () => {
  it("records failed items and still completes below the threshold", async () => {
    const records: SourceRecord[] = [
      fetched(ident("T1", "B1", "ok-1"), "1"),
      { ...ident("T1", "B1", "bad"), status: "failed", error: "HTTP 500" },
      fetched(ident("T1", "B1", "ok-2"), "2"),
    ];
    const result = await stack.coordinator.run("T1", streamOf(records));

    expect(result).toMatchObject({ status: "complete", itemsProcessed: 2, itemsSkipped: 1 });
    const skipped = stack.snapshots.skipped(result.snapshotId);
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toMatchObject({ itemId: "bad", reason: "HTTP 500", resolvedAt: null });
  });

  it("keeps the last known digest of a failed item and re-plans it", async () => {
    const jan = "2026-01-01T00:00:00Z";
    await stack.coordinator.run("T1", streamOf([fetched(M1, "body", jan)]));
    const digest = stack.index.lookup(M1).digest;

    const r2 = await stack.coordinator.run("T1", streamOf<SourceRecord>([{ ...M1, status: "failed", error: "timeout" }]));
    expect(stack.snapshots.resolve(r2.snapshotId, M1)).toBe(digest);

    const ref = { ...M1, providerModifiedAt: new Date(jan) };
    expect(stack.snapshots.computeIncrementalPlan("T1", r2.snapshotId, [ref]).size).toBe(1);

    const r3 = await stack.coordinator.run("T1", streamOf([fetched(M1, "body", jan)]));
    expect(stack.snapshots.computeIncrementalPlan("T1", r3.snapshotId, [ref]).size).toBe(0);
  });

  it("skips items whose bytes cannot be written", async () => {
    stack.storage.failNextWrites = 3;
    const result = await stack.coordinator.run("T1", streamOf([fetched(M1, "unwritable")]));

    expect(result).toMatchObject({ status: "complete", itemsProcessed: 0, itemsSkipped: 1 });
    expect(stack.index.find(M1)).toBeNull();
    expect(stack.snapshots.skipped(result.snapshotId)[0]?.reason).toContain("failed after 3 attempt(s)");
  });

  it("fails the run once the failure rate exceeds the threshold", async () => {
    stack.db.close();
    stack = makeStack({ concurrency: 1, maxFailureRate: 0.5, minFailureSample: 2 });
    const records: SourceRecord[] = ["a", "b", "c", "d"].map((id): SourceRecord => ({
      ...ident("T1", "B1", id),
      status: "failed",
      error: "HTTP 503",
    }));
    const result = await stack.coordinator.run("T1", streamOf(records));

    expect(result.status).toBe("failed");
    expect(result.error).toBe("Failure rate 100.0% exceeds 50.0% (2 of 2 items)");
    expect(stack.snapshots.get(result.snapshotId)).toMatchObject({ status: "failed", itemsSkipped: 2 });
  });

  it("fails the snapshot when the source throws", async () => {
    async function* broken(): AsyncGenerator<SourceRecord> {
      yield fetched(M1, "first");
      throw new Error("listing exploded");
    }
    const result = await stack.coordinator.run("T1", broken());

    expect(result).toMatchObject({ status: "failed", error: "Mail source failed: listing exploded", itemsProcessed: 1 });
    expect(stack.store.has(stack.store.hash(Buffer.from("first")))).toBe(true);
  });

  it("fails the run on a record outside its scope", async () => {
    const result = await stack.coordinator.run("T1", streamOf([fetched(ident("T2", "B1", "x"), "foreign")]));

    expect(result.status).toBe("failed");
    expect(result.error).toBe('Record for tenant "T2" is outside scope "T1"');
    expect(stack.index.find(ident("T2", "B1", "x"))).toBeNull();
  });

  it("rejects a second run of a busy scope", async () => {
    stack.snapshots.begin("T1");
    await expect(stack.coordinator.run("T1", streamOf([]))).rejects.toThrow(AlreadyRunningError);
  });
});

describe("IngestionCoordinator cancellation", () => {
  it("fails the snapshot, lets in-flight items finish and keeps their blobs", async () => {
    const controller = new AbortController();
    const second = ident("T1", "B1", "second");
    async function* source(): AsyncGenerator<SourceRecord> {
      yield fetched(M1, "in flight");
      controller.abort();
      yield fetched(second, "never stored");
    }

    const result = await stack.coordinator.run("T1", source(), { signal: controller.signal });

    expect(result).toMatchObject({ status: "failed", error: "cancelled", itemsProcessed: 1 });
    expect(stack.snapshots.get(result.snapshotId).status).toBe("failed");
    expect(stack.index.lookup(M1).digest).toBe(stack.store.hash(Buffer.from("in flight")));
    expect(stack.index.find(second)).toBeNull();
  });

  it("fails the snapshot when cancelled while the last item is still being written", async () => {
    const controller = new AbortController();
    let openGate: () => void = () => undefined;
    stack.storage.writeGate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const pending = stack.coordinator.run("T1", streamOf([fetched(M1, "slow disk")]), { signal: controller.signal });
    while (stack.storage.writes === 0) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    controller.abort();
    openGate();
    const result = await pending;

    expect(result).toMatchObject({ status: "failed", error: "cancelled", itemsProcessed: 1 });
    expect(stack.snapshots.get(result.snapshotId)).toMatchObject({ status: "failed", failureReason: "cancelled" });
  });

  it("does nothing when cancelled before the first record", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await stack.coordinator.run("T1", streamOf([fetched(M1, "x")]), { signal: controller.signal });

    expect(result).toMatchObject({ status: "failed", error: "cancelled", itemsProcessed: 0 });
    expect(stack.storage.writes).toBe(0);
  });
});
