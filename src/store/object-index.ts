import { objectRepo, runInTransaction } from "../db.js";
import type { DB } from "../db.js";
import { NotFoundError } from "../errors.js";
import { identityKey, pickIdentity } from "../types.js";
import type { ItemIdentity, ItemMetadata, ObjectEntry, TenantScope, UpsertResult } from "../types.js";

export interface UpsertInput {
  digest: string;
  size: number;
  providerModifiedAt: Date | null;
  metadata?: ItemMetadata;
}

/**
 * Current-state catalog: which digest every backed-up message and attachment
 * resolves to. Entries are never deleted; a provider-side deletion only sets
 * a tombstone so historical snapshots stay resolvable.
 */
export class ObjectIndex {
  private readonly db: DB;
  private readonly objects: ReturnType<typeof objectRepo>;
  private readonly now: () => Date;

  constructor(db: DB, options: { now?: () => Date } = {}) {
    this.db = db;
    this.objects = objectRepo(db);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Records that `identity` currently resolves to `input.digest`. The caller
   * owns the Content Store side: it must release `previousDigest` after an
   * `updated` outcome.
   */
  upsert(identity: ItemIdentity, input: UpsertInput): UpsertResult {
    return runInTransaction<UpsertResult>(this.db, () => {
      const now = this.now();
      const existing = this.objects.find(identity);

      if (!existing) {
        this.objects.insert({
          ...pickIdentity(identity),
          digest: input.digest,
          size: input.size,
          providerModifiedAt: input.providerModifiedAt,
          firstSeenAt: now,
          lastSeenAt: now,
          metadata: input.metadata ?? {},
        });
        return { outcome: "created", entry: this.require(identity), previousDigest: null };
      }

      this.objects.update(
        identity,
        {
          digest: input.digest,
          size: input.size,
          providerModifiedAt: input.providerModifiedAt,
          metadata: input.metadata ?? null,
        },
        now,
      );

      if (existing.digest === input.digest) {
        return { outcome: "unchanged", entry: this.require(identity), previousDigest: null };
      }
      return { outcome: "updated", entry: this.require(identity), previousDigest: existing.digest };
    });
  }

  /** Refreshes last-seen for an item the provider reports as unchanged. */
  touch(identity: ItemIdentity, providerModifiedAt: Date | null): ObjectEntry {
    if (!this.objects.touch(identity, providerModifiedAt, this.now())) {
      throw new NotFoundError(`No index entry for ${identityKey(identity)}`);
    }
    return this.require(identity);
  }

  /** Marks the entry as gone upstream. Its blob reference is kept. */
  tombstone(identity: ItemIdentity): ObjectEntry {
    return runInTransaction(this.db, () => {
      this.objects.tombstone(identity, this.now());
      return this.require(identity);
    });
  }

  lookup(identity: ItemIdentity): ObjectEntry {
    return this.require(identity);
  }

  find(identity: ItemIdentity): ObjectEntry | null {
    return this.objects.find(identity);
  }

  /**
   * Entries that existed at `asOf` and had not been tombstoned by then,
   * ordered by identity. Rows are read lazily, one page at a time, so other
   * pipelines can keep writing while a caller walks the sequence.
   */
  *listForSnapshot(scope: TenantScope, asOf: Date, pageSize = 500): Generator<ObjectEntry> {
    let after: ItemIdentity | null = null;
    for (;;) {
      const page = this.objects.findForSnapshotPage(scope, asOf, after, pageSize);
      yield* page;
      const last = page[page.length - 1];
      if (!last || page.length < pageSize) return;
      after = last;
    }
  }

  listMailbox(tenantId: string, mailboxId: string, limit = 500): ObjectEntry[] {
    return this.objects.findLiveByMailbox(tenantId, mailboxId, limit);
  }

  /** Live entries of the scope whose last sighting is older than `seenBefore`. */
  findUnseen(scope: TenantScope, seenBefore: Date): ObjectEntry[] {
    return this.objects.findUnseenLive(scope, seenBefore);
  }

  private require(identity: ItemIdentity): ObjectEntry {
    const entry = this.objects.find(identity);
    if (!entry) {
      throw new NotFoundError(`No index entry for ${identityKey(identity)}`);
    }
    return entry;
  }
}
