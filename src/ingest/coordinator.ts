import { errorMessage, FetchFailure, InvalidStateError, isMailVaultError } from "../errors.js";
import { ipcBus } from "../ipc.js";
import type { IpcBus, ItemSkippedEvent, ItemStoredEvent } from "../ipc.js";
import { WorkerPool } from "../queue.js";
import type { ContentStore } from "../store/content-store.js";
import type { ObjectIndex } from "../store/object-index.js";
import type { SnapshotManager } from "../store/snapshot-manager.js";
import { identityKey, pickIdentity, scopeIncludes } from "../types.js";
import type {
  FetchedRecord,
  ItemIdentity,
  PutResult,
  RunResult,
  SourceRecord,
  TenantScope,
  UpsertOutcome,
  UpsertResult,
  ObjectEntry,
} from "../types.js";

export interface CoordinatorOptions {
  /** Items processed at once within one run (default: 4). */
  concurrency?: number;
  /** Fraction of failed items that fails the whole run (default: 0.2). */
  maxFailureRate?: number;
  /** Items that must have been seen before the rate is enforced (default: 20). */
  minFailureSample?: number;
  bus?: IpcBus;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Stored on the snapshot. */
  label?: string | null;
  /** Tombstone live entries of the scope the source did not list. Only safe for complete listings. */
  reconcileDeletions?: boolean;
}

interface RunState {
  snapshotId: number;
  scope: TenantScope;
  seen: number;
  processed: number;
  skipped: number;
  tombstoned: number;
  fatal: Error | null;
  controller: AbortController;
}

/**
 * Drives one backup run for a tenant scope: opens a snapshot, pushes every
 * source record through a bounded worker pool into the Content Store, the
 * Object Index and the snapshot, then completes or fails the snapshot.
 */
export class IngestionCoordinator {
  private readonly store: ContentStore;
  private readonly index: ObjectIndex;
  private readonly snapshots: SnapshotManager;
  private readonly concurrency: number;
  private readonly maxFailureRate: number;
  private readonly minFailureSample: number;
  private readonly bus: IpcBus;

  constructor(
    store: ContentStore,
    index: ObjectIndex,
    snapshots: SnapshotManager,
    options: CoordinatorOptions = {},
  ) {
    this.store = store;
    this.index = index;
    this.snapshots = snapshots;
    this.concurrency = options.concurrency ?? 4;
    this.maxFailureRate = options.maxFailureRate ?? 0.2;
    this.minFailureSample = options.minFailureSample ?? 20;
    this.bus = options.bus ?? ipcBus;
  }

  /**
   * Runs the scope to completion. Throws `AlreadyRunningError` when the scope
   * is busy; every later failure ends in a failed snapshot and a failed
   * result instead of an exception.
   */
  async run(
    scope: TenantScope,
    records: AsyncIterable<SourceRecord> | Iterable<SourceRecord>,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const snapshotId = this.snapshots.begin(scope, options.label ?? null);
    const startedAt = this.snapshots.get(snapshotId).startedAt;
    const state: RunState = {
      snapshotId,
      scope,
      seen: 0,
      processed: 0,
      skipped: 0,
      tombstoned: 0,
      fatal: null,
      controller: new AbortController(),
    };

    const onCancel = (): void => state.controller.abort();
    options.signal?.addEventListener("abort", onCancel, { once: true });
    if (options.signal?.aborted) state.controller.abort();

    console.log(`[ingest] Snapshot ${snapshotId} started for scope "${scope}"`);
    this.bus.publish("run:started", "ingest", { snapshotId, scope });

    const pool = new WorkerPool<SourceRecord>((record) => this.handle(state, record), {
      concurrency: this.concurrency,
    });
    pool.on("failed", (_record: SourceRecord, err: Error) => this.abortRun(state, err));

    try {
      for await (const record of records) {
        if (state.controller.signal.aborted) break;
        if (!scopeIncludes(scope, record.tenantId)) {
          this.abortRun(state, new InvalidStateError(`Record for tenant "${record.tenantId}" is outside scope "${scope}"`));
          break;
        }
        await pool.push(record);
      }
    } catch (err) {
      this.abortRun(state, new FetchFailure(`Mail source failed: ${errorMessage(err)}`, err));
    }

    // Cancellation still counts while the last items are in flight.
    await pool.onIdle();
    options.signal?.removeEventListener("abort", onCancel);

    try {
      if (!state.fatal && !state.controller.signal.aborted && options.reconcileDeletions) {
        this.reconcileDeletions(state, startedAt);
      }
    } catch (err) {
      this.abortRun(state, err instanceof Error ? err : new Error(String(err)));
    }

    return this.finish(state);
  }

  // ---------- Per-item handling ----------

  private async handle(state: RunState, record: SourceRecord): Promise<void> {
    if (state.controller.signal.aborted) return;

    try {
      switch (record.status) {
        case "fetched":
          state.seen++;
          await this.ingestFetched(state, record);
          break;
        case "unchanged": {
          state.seen++;
          const entry = this.touchOrFail(record, record.providerModifiedAt);
          this.snapshots.recordItem(state.snapshotId, record, entry.digest, record.providerModifiedAt);
          state.processed++;
          break;
        }
        case "deleted":
          this.tombstone(state, record);
          break;
        case "failed":
          state.seen++;
          throw new FetchFailure(record.error);
      }
    } catch (err) {
      if (isMailVaultError(err, "FetchFailure") || isMailVaultError(err, "StorageWriteFailure")) {
        this.skip(state, record, err.message);
        return;
      }
      throw err;
    }
  }

  private async ingestFetched(state: RunState, record: FetchedRecord): Promise<void> {
    const digest = this.store.hash(record.bytes);
    const existing = this.index.find(record);
    const sameDigest = existing?.digest === digest;
    const upsertInput = {
      digest,
      size: record.bytes.length,
      providerModifiedAt: record.providerModifiedAt,
      metadata: record.metadata,
    };

    let outcome: UpsertOutcome;
    let wasNew = false;

    if (sameDigest && this.store.has(digest)) {
      outcome = this.index.upsert(record, upsertInput).outcome;
    } else {
      const stored = await this.storeBytes(digest, record.bytes);
      wasNew = stored.wasNew;

      let result: UpsertResult;
      try {
        result = this.index.upsert(record, upsertInput);
      } catch (err) {
        this.store.release(digest);
        throw err;
      }
      outcome = result.outcome;

      if (outcome === "unchanged" && !sameDigest) {
        // Another worker moved the entry to this digest first and holds the reference.
        this.store.release(digest);
      }
      if (outcome === "updated" && result.previousDigest) {
        this.store.release(result.previousDigest);
      }
    }

    this.snapshots.recordItem(state.snapshotId, record, digest, record.providerModifiedAt);
    this.snapshots.resolveSkipped(record);
    state.processed++;

    const event: ItemStoredEvent = {
      snapshotId: state.snapshotId,
      identity: pickIdentity(record),
      digest,
      outcome,
      wasNew,
    };
    this.bus.publish("item:stored", "ingest", event);
  }

  private async storeBytes(digest: string, bytes: Buffer): Promise<PutResult> {
    if (this.store.has(digest)) {
      try {
        this.store.retain(digest);
        return { digest, wasNew: false };
      } catch (err) {
        // Reclaimed between the check and the retain; store the bytes again.
        if (!isMailVaultError(err, "NotFound")) throw err;
      }
    }
    return this.store.put(bytes);
  }

  private tombstone(state: RunState, identity: ItemIdentity): void {
    if (!this.index.find(identity)) {
      console.log(`[ingest] Ignoring deletion of unknown item ${identityKey(identity)}`);
      return;
    }
    this.index.tombstone(identity);
    state.tombstoned++;
    this.bus.publish("item:tombstoned", "ingest", { snapshotId: state.snapshotId, identity: pickIdentity(identity) });
  }

  private touchOrFail(identity: ItemIdentity, providerModifiedAt: Date | null): ObjectEntry {
    if (!this.index.find(identity)) {
      throw new FetchFailure(`Item ${identityKey(identity)} was reported unchanged but is not indexed`);
    }
    return this.index.touch(identity, providerModifiedAt);
  }

  /**
   * Records the failure so the next plan re-fetches the item. An item backed
   * up before keeps its last known digest in this snapshot.
   */
  private skip(state: RunState, identity: ItemIdentity, reason: string): void {
    state.skipped++;
    this.snapshots.recordSkipped(state.snapshotId, identity, reason);

    const entry = this.index.find(identity);
    if (entry && !entry.tombstonedAt) {
      this.index.touch(identity, null);
      this.snapshots.recordItem(state.snapshotId, identity, entry.digest, entry.providerModifiedAt);
    }

    console.warn(`[ingest] Skipped ${identityKey(identity)}: ${reason}`);
    const event: ItemSkippedEvent = { snapshotId: state.snapshotId, identity: pickIdentity(identity), reason };
    this.bus.publish("item:skipped", "ingest", event);

    if (state.seen >= this.minFailureSample && state.skipped / state.seen > this.maxFailureRate) {
      this.abortRun(
        state,
        new Error(
          `Failure rate ${(state.skipped / state.seen * 100).toFixed(1)}% exceeds ${(this.maxFailureRate * 100).toFixed(1)}% ` +
          `(${state.skipped} of ${state.seen} items)`,
        ),
      );
    }
  }

  private reconcileDeletions(state: RunState, startedAt: Date): void {
    for (const entry of this.index.findUnseen(state.scope, startedAt)) {
      this.tombstone(state, entry);
    }
  }

  // ---------- Run termination ----------

  private abortRun(state: RunState, err: Error): void {
    if (!state.fatal) {
      state.fatal = err;
    }
    state.controller.abort();
  }

  private finish(state: RunState): RunResult {
    const counters = { itemsProcessed: state.processed, itemsSkipped: state.skipped };
    const base = {
      snapshotId: state.snapshotId,
      scope: state.scope,
      itemsProcessed: state.processed,
      itemsSkipped: state.skipped,
      itemsTombstoned: state.tombstoned,
    };

    const reason = state.fatal?.message ?? (state.controller.signal.aborted ? "cancelled" : null);
    if (reason !== null) {
      this.snapshots.fail(state.snapshotId, reason, counters);
      console.error(`[ingest] Snapshot ${state.snapshotId} failed: ${reason}`);
      const result: RunResult = { ...base, status: "failed", error: reason };
      this.bus.publish("run:failed", "ingest", result);
      return result;
    }

    this.snapshots.complete(state.snapshotId, counters);
    console.log(
      `[ingest] Snapshot ${state.snapshotId} complete: ${state.processed} processed, ` +
      `${state.skipped} skipped, ${state.tombstoned} tombstoned`,
    );
    const result: RunResult = { ...base, status: "complete" };
    this.bus.publish("run:completed", "ingest", result);
    return result;
  }
}
