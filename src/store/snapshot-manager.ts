import { objectRepo, runInTransaction, snapshotRepo } from "../db.js";
import type { DB } from "../db.js";
import { AlreadyRunningError, InvalidStateError, NotFoundError } from "../errors.js";
import { ALL_TENANTS, identityKey } from "../types.js";
import type {
  ItemIdentity,
  ItemRef,
  RunCounters,
  SkippedItem,
  Snapshot,
  SnapshotItem,
  TenantScope,
} from "../types.js";

export type RecordOutcome = "recorded" | "duplicate";

/**
 * Owns the historical, point-in-time views. A snapshot moves
 * Running → Complete or Running → Failed and never leaves a terminal state;
 * the (identity, digest) pairs it recorded never change afterwards.
 */
export class SnapshotManager {
  private readonly db: DB;
  private readonly snapshots: ReturnType<typeof snapshotRepo>;
  private readonly objects: ReturnType<typeof objectRepo>;
  private readonly now: () => Date;

  constructor(db: DB, options: { now?: () => Date } = {}) {
    this.db = db;
    this.snapshots = snapshotRepo(db);
    this.objects = objectRepo(db);
    this.now = options.now ?? (() => new Date());
  }

  // ---------- Lifecycle ----------

  begin(scope: TenantScope, label: string | null = null): number {
    return runInTransaction(this.db, () => {
      const running = this.snapshots.findRunning(scope);
      if (running) {
        throw new AlreadyRunningError(scope, running.id);
      }
      return this.snapshots.insert(scope, label, this.now());
    });
  }

  /**
   * Appends one (identity, digest) pair. Recording the same pair twice is a
   * no-op; a different digest for an identity already in the snapshot is
   * rejected.
   */
  recordItem(
    snapshotId: number,
    identity: ItemIdentity,
    digest: string,
    providerModifiedAt: Date | null = null,
  ): RecordOutcome {
    return runInTransaction<RecordOutcome>(this.db, () => {
      this.requireRunning(snapshotId);

      const inserted = this.snapshots.insertItem({
        snapshotId,
        tenantId: identity.tenantId,
        mailboxId: identity.mailboxId,
        itemId: identity.itemId,
        kind: identity.kind,
        digest,
        providerModifiedAt,
      });
      if (inserted) return "recorded";

      const existing = this.snapshots.findItem(snapshotId, identity);
      if (existing && existing.digest !== digest) {
        throw new InvalidStateError(
          `Snapshot ${snapshotId} already records ${identityKey(identity)} as ${existing.digest}, not ${digest}`,
        );
      }
      return "duplicate";
    });
  }

  recordSkipped(snapshotId: number, identity: ItemIdentity, reason: string): void {
    runInTransaction(this.db, () => {
      this.requireRunning(snapshotId);
      this.snapshots.insertSkipped(snapshotId, identity, reason, this.now());
    });
  }

  /** Closes out earlier skipped records once the identity was ingested again. */
  resolveSkipped(identity: ItemIdentity): number {
    return this.snapshots.resolveSkipped(identity, this.now());
  }

  complete(snapshotId: number, counters: RunCounters): Snapshot {
    return this.finish(snapshotId, "complete", null, counters);
  }

  /** Partial records are kept for diagnostics; the snapshot is never resumed. */
  fail(snapshotId: number, reason: string, counters: RunCounters): Snapshot {
    return this.finish(snapshotId, "failed", reason, counters);
  }

  /**
   * Fails snapshots left running by a process that died mid-run, so their
   * scopes can start again. Call before any run is started.
   */
  failInterrupted(): number[] {
    return runInTransaction<number[]>(this.db, () => {
      const stale = this.snapshots.findAllRunning();
      for (const snapshot of stale) {
        this.finish(snapshot.id, "failed", "interrupted", {
          itemsProcessed: this.snapshots.countItems(snapshot.id),
          itemsSkipped: this.snapshots.findSkipped(snapshot.id).length,
        });
      }
      return stale.map((s) => s.id);
    });
  }

  // ---------- Queries ----------

  get(snapshotId: number): Snapshot {
    const snapshot = this.snapshots.find(snapshotId);
    if (!snapshot) {
      throw new NotFoundError(`Snapshot ${snapshotId} not found`);
    }
    return snapshot;
  }

  *items(snapshotId: number, pageSize = 500): Generator<SnapshotItem> {
    this.get(snapshotId);
    let after: ItemIdentity | null = null;
    for (;;) {
      const page = this.snapshots.findItemsPage(snapshotId, after, pageSize);
      yield* page;
      const last = page[page.length - 1];
      if (!last || page.length < pageSize) return;
      after = last;
    }
  }

  countItems(snapshotId: number): number {
    return this.snapshots.countItems(snapshotId);
  }

  /** The digest `identity` resolved to when the snapshot was taken. */
  resolve(snapshotId: number, identity: ItemIdentity): string {
    const item = this.snapshots.findItem(snapshotId, identity);
    if (!item) {
      throw new NotFoundError(`Snapshot ${snapshotId} has no entry for ${identityKey(identity)}`);
    }
    return item.digest;
  }

  skipped(snapshotId: number): SkippedItem[] {
    return this.snapshots.findSkipped(snapshotId);
  }

  /** Completed snapshots covering the scope, most recent first. */
  listRestoreCandidates(scope: TenantScope): Snapshot[] {
    return this.snapshots.findComplete(scope);
  }

  /** The newest completed snapshot usable as an incremental base for the scope. */
  latestComplete(scope: TenantScope): Snapshot | null {
    const candidates = scope === ALL_TENANTS
      ? this.snapshots.findComplete(scope).filter((s) => s.scope === ALL_TENANTS)
      : this.snapshots.findComplete(scope);
    return candidates[0] ?? null;
  }

  // ---------- Incremental planning ----------

  /**
   * Identity keys (see `identityKey`) of the listed items that must be
   * downloaded again. Unchanged items can be skipped; the content digest
   * still catches anything this selects wrongly.
   */
  computeIncrementalPlan(scope: TenantScope, sinceSnapshotId: number, listing: Iterable<ItemRef>): Set<string> {
    const needsRefetch = this.planner(scope, sinceSnapshotId);
    const plan = new Set<string>();
    for (const ref of listing) {
      if (needsRefetch(ref)) plan.add(identityKey(ref));
    }
    return plan;
  }

  /** Per-item form of `computeIncrementalPlan`, for sources that list lazily. */
  planner(scope: TenantScope, sinceSnapshotId: number): (ref: ItemRef) => boolean {
    const since = this.get(sinceSnapshotId);
    if (since.status === "running") {
      throw new InvalidStateError(`Snapshot ${since.id} is still running and cannot be a plan base`);
    }
    if (since.scope !== scope && since.scope !== ALL_TENANTS) {
      throw new InvalidStateError(`Snapshot ${since.id} covers "${since.scope}", not "${scope}"`);
    }

    return (ref: ItemRef): boolean => {
      const recorded = this.snapshots.findItem(since.id, ref);
      if (!recorded) return true;
      if (!recorded.providerModifiedAt || !ref.providerModifiedAt) return true;
      if (ref.providerModifiedAt.getTime() > recorded.providerModifiedAt.getTime()) return true;

      const entry = this.objects.find(ref);
      if (!entry || entry.tombstonedAt) return true;

      return this.snapshots.hasUnresolvedSkip(ref);
    };
  }

  // ---------- Retention ----------

  /**
   * Keeps the newest `keepLast` completed snapshots of exactly this scope and
   * drops older completed ones, plus failed ones older than the oldest kept.
   * Running snapshots are never touched. Returns the removed ids.
   */
  prune(scope: TenantScope, keepLast: number): number[] {
    if (keepLast <= 0) return [];

    return runInTransaction<number[]>(this.db, () => {
      const all = this.snapshots.findByExactScope(scope);
      const kept = all.filter((s) => s.status === "complete").slice(0, keepLast);
      const oldestKept = kept[kept.length - 1];
      if (!oldestKept) return [];

      const removed = all
        .filter((s) => s.status !== "running" && s.id < oldestKept.id)
        .map((s) => s.id);
      for (const id of removed) {
        this.snapshots.delete(id);
      }
      return removed;
    });
  }

  // ---------- Internals ----------

  private finish(
    snapshotId: number,
    status: "complete" | "failed",
    reason: string | null,
    counters: RunCounters,
  ): Snapshot {
    return runInTransaction(this.db, () => {
      const snapshot = this.get(snapshotId);
      if (!this.snapshots.finish(snapshotId, status, reason, counters, this.now())) {
        throw new InvalidStateError(`Snapshot ${snapshotId} is ${snapshot.status}, cannot move to ${status}`);
      }
      return this.get(snapshotId);
    });
  }

  private requireRunning(snapshotId: number): Snapshot {
    const snapshot = this.get(snapshotId);
    if (snapshot.status !== "running") {
      throw new InvalidStateError(`Snapshot ${snapshotId} is ${snapshot.status}, not running`);
    }
    return snapshot;
  }
}
