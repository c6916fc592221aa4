import Database from "better-sqlite3";
import path from "path";
import fs from "fs";
import type {
  ContentBlob,
  ItemIdentity,
  ItemKind,
  ItemMetadata,
  ObjectEntry,
  RunCounters,
  SkippedItem,
  Snapshot,
  SnapshotItem,
  SnapshotStatus,
  TenantScope,
} from "./types.js";

export type DB = Database.Database;

/** Opens (and migrates) a database. ":memory:" gives a private in-memory one. */
export function openDb(dbPath: string): DB {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
}

// ---------- Transaction helper ----------

export function runInTransaction<T>(db: DB, fn: () => T): T {
  return db.transaction(fn)();
}

// ---------- Migration ----------

function migrate(db: DB): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = db
    .prepare<[], { version: number }>("SELECT version FROM schema_migrations ORDER BY version")
    .all();
  const applied = new Set(rows.map((r) => r.version));

  for (const [version, sql] of MIGRATIONS) {
    if (!applied.has(version)) {
      runInTransaction(db, () => {
        db.exec(sql);
        db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(version);
      });
      if (db.name !== ":memory:") {
        console.log(`[DB] Applied migration v${version}`);
      }
    }
  }
}

const MIGRATIONS: Array<[number, string]> = [
  [
    1,
    `
    CREATE TABLE IF NOT EXISTS content_blobs (
      digest TEXT PRIMARY KEY,
      size INTEGER NOT NULL,
      storage_ref TEXT NOT NULL,
      ref_count INTEGER NOT NULL DEFAULT 0 CHECK (ref_count >= 0),
      created_at TEXT NOT NULL,
      touched_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_content_blobs_reclaim ON content_blobs (ref_count, touched_at);

    CREATE TABLE IF NOT EXISTS object_entries (
      tenant_id TEXT NOT NULL,
      mailbox_id TEXT NOT NULL,
      item_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('message', 'attachment')),
      digest TEXT NOT NULL,
      size INTEGER NOT NULL,
      provider_modified_at TEXT,
      first_seen_at TEXT NOT NULL,
      last_seen_at TEXT NOT NULL,
      tombstoned_at TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      PRIMARY KEY (tenant_id, mailbox_id, item_id, kind)
    );

    CREATE INDEX IF NOT EXISTS idx_object_entries_digest ON object_entries (digest);

    CREATE TABLE IF NOT EXISTS snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      scope TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'complete', 'failed')),
      started_at TEXT NOT NULL,
      finished_at TEXT,
      failure_reason TEXT,
      items_processed INTEGER NOT NULL DEFAULT 0,
      items_skipped INTEGER NOT NULL DEFAULT 0
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_snapshots_one_running
      ON snapshots (scope) WHERE status = 'running';
    CREATE INDEX IF NOT EXISTS idx_snapshots_scope_status ON snapshots (scope, status, id);

    CREATE TABLE IF NOT EXISTS snapshot_items (
      snapshot_id INTEGER NOT NULL,
      tenant_id TEXT NOT NULL,
      mailbox_id TEXT NOT NULL,
      item_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      digest TEXT NOT NULL,
      provider_modified_at TEXT,
      PRIMARY KEY (snapshot_id, tenant_id, mailbox_id, item_id, kind),
      FOREIGN KEY (snapshot_id) REFERENCES snapshots (id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_snapshot_items_digest ON snapshot_items (digest);

    CREATE TABLE IF NOT EXISTS skipped_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      snapshot_id INTEGER NOT NULL,
      tenant_id TEXT NOT NULL,
      mailbox_id TEXT NOT NULL,
      item_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      reason TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      resolved_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_skipped_items_identity
      ON skipped_items (tenant_id, mailbox_id, item_id, kind, resolved_at);
    `,
  ],
  [
    2,
    `
    ALTER TABLE snapshots ADD COLUMN label TEXT;
    `,
  ],
];

// ---------- Content Blob Repository ----------

export function blobRepo(db: DB) {
  return {
    find(digest: string): ContentBlob | null {
      const row = db.prepare<[string], BlobRow>("SELECT * FROM content_blobs WHERE digest = ?").get(digest);
      return row ? rowToBlob(row) : null;
    },

    insert(digest: string, size: number, storageRef: string, now: Date): void {
      const ts = now.toISOString();
      db.prepare(`
        INSERT INTO content_blobs (digest, size, storage_ref, ref_count, created_at, touched_at)
        VALUES (?, ?, ?, 1, ?, ?)
      `).run(digest, size, storageRef, ts, ts);
    },

    /** Returns false when the digest is not catalogued. */
    increment(digest: string, now: Date): boolean {
      const res = db.prepare(`
        UPDATE content_blobs SET ref_count = ref_count + 1, touched_at = ? WHERE digest = ?
      `).run(now.toISOString(), digest);
      return res.changes > 0;
    },

    /** Returns false when the count is already zero. */
    decrement(digest: string, now: Date): boolean {
      const res = db.prepare(`
        UPDATE content_blobs SET ref_count = ref_count - 1, touched_at = ? WHERE digest = ? AND ref_count > 0
      `).run(now.toISOString(), digest);
      return res.changes > 0;
    },

    findReclaimable(touchedBefore: Date): ContentBlob[] {
      const rows = db.prepare<[string], BlobRow>(`
        SELECT * FROM content_blobs b
        WHERE b.ref_count = 0
          AND b.touched_at <= ?
          AND NOT EXISTS (SELECT 1 FROM snapshot_items s WHERE s.digest = b.digest)
        ORDER BY b.digest
      `).all(touchedBefore.toISOString());
      return rows.map(rowToBlob);
    },

    /** Deletes the row only while it is still unreferenced, untouched and outside every snapshot. */
    deleteUnreferenced(digest: string, touchedBefore: Date): boolean {
      const res = db.prepare(`
        DELETE FROM content_blobs
        WHERE digest = ? AND ref_count = 0 AND touched_at <= ?
          AND NOT EXISTS (SELECT 1 FROM snapshot_items s WHERE s.digest = content_blobs.digest)
      `).run(digest, touchedBefore.toISOString());
      return res.changes > 0;
    },

    totals(): { blobs: number; bytes: number } {
      const row = db
        .prepare<[], { blobs: number; bytes: number | null }>(
          "SELECT COUNT(*) AS blobs, SUM(size) AS bytes FROM content_blobs",
        )
        .get();
      return { blobs: row?.blobs ?? 0, bytes: row?.bytes ?? 0 };
    },
  };
}

// ---------- Object Entry Repository ----------

const IDENTITY_WHERE = "tenant_id = ? AND mailbox_id = ? AND item_id = ? AND kind = ?";
const SCOPE_WHERE = "(? = 'all' OR tenant_id = ?)";

function identityParams(identity: ItemIdentity): [string, string, string, string] {
  return [identity.tenantId, identity.mailboxId, identity.itemId, identity.kind];
}

export function objectRepo(db: DB) {
  return {
    find(identity: ItemIdentity): ObjectEntry | null {
      const row = db
        .prepare<[string, string, string, string], ObjectRow>(`SELECT * FROM object_entries WHERE ${IDENTITY_WHERE}`)
        .get(...identityParams(identity));
      return row ? rowToObject(row) : null;
    },

    insert(entry: Omit<ObjectEntry, "tombstonedAt">): void {
      db.prepare(`
        INSERT INTO object_entries (tenant_id, mailbox_id, item_id, kind, digest, size, provider_modified_at, first_seen_at, last_seen_at, metadata)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        ...identityParams(entry),
        entry.digest,
        entry.size,
        entry.providerModifiedAt?.toISOString() ?? null,
        entry.firstSeenAt.toISOString(),
        entry.lastSeenAt.toISOString(),
        JSON.stringify(entry.metadata),
      );
    },

    update(
      identity: ItemIdentity,
      fields: { digest: string; size: number; providerModifiedAt: Date | null; metadata: ItemMetadata | null },
      now: Date,
    ): void {
      db.prepare(`
        UPDATE object_entries
        SET digest = ?, size = ?, provider_modified_at = COALESCE(?, provider_modified_at),
            metadata = COALESCE(?, metadata), last_seen_at = ?, tombstoned_at = NULL
        WHERE ${IDENTITY_WHERE}
      `).run(
        fields.digest,
        fields.size,
        fields.providerModifiedAt?.toISOString() ?? null,
        fields.metadata ? JSON.stringify(fields.metadata) : null,
        now.toISOString(),
        ...identityParams(identity),
      );
    },

    touch(identity: ItemIdentity, providerModifiedAt: Date | null, now: Date): boolean {
      const res = db.prepare(`
        UPDATE object_entries
        SET last_seen_at = ?, provider_modified_at = COALESCE(?, provider_modified_at), tombstoned_at = NULL
        WHERE ${IDENTITY_WHERE}
      `).run(now.toISOString(), providerModifiedAt?.toISOString() ?? null, ...identityParams(identity));
      return res.changes > 0;
    },

    tombstone(identity: ItemIdentity, now: Date): void {
      db.prepare(`
        UPDATE object_entries SET tombstoned_at = ? WHERE ${IDENTITY_WHERE} AND tombstoned_at IS NULL
      `).run(now.toISOString(), ...identityParams(identity));
    },

    /** One keyset page of the entries visible at `asOf`, after `after` in identity order. */
    findForSnapshotPage(scope: TenantScope, asOf: Date, after: ItemIdentity | null, limit: number): ObjectEntry[] {
      const ts = asOf.toISOString();
      const cursor: [string, string, string, string] = after ? identityParams(after) : ["", "", "", ""];
      const rows = db.prepare<[string, string, string, string, string, string, string, string, number], ObjectRow>(`
        SELECT * FROM object_entries
        WHERE ${SCOPE_WHERE}
          AND first_seen_at <= ?
          AND (tombstoned_at IS NULL OR tombstoned_at > ?)
          AND (tenant_id, mailbox_id, item_id, kind) > (?, ?, ?, ?)
        ORDER BY tenant_id, mailbox_id, item_id, kind
        LIMIT ?
      `).all(scope, scope, ts, ts, ...cursor, limit);
      return rows.map(rowToObject);
    },

    /** Live entries of the scope not seen since `seenBefore`. */
    findUnseenLive(scope: TenantScope, seenBefore: Date): ObjectEntry[] {
      const rows = db.prepare<[string, string, string], ObjectRow>(`
        SELECT * FROM object_entries
        WHERE ${SCOPE_WHERE} AND tombstoned_at IS NULL AND last_seen_at < ?
        ORDER BY tenant_id, mailbox_id, item_id, kind
      `).all(scope, scope, seenBefore.toISOString());
      return rows.map(rowToObject);
    },

    findLiveByMailbox(tenantId: string, mailboxId: string, limit: number): ObjectEntry[] {
      const rows = db.prepare<[string, string, number], ObjectRow>(`
        SELECT * FROM object_entries
        WHERE tenant_id = ? AND mailbox_id = ? AND tombstoned_at IS NULL
        ORDER BY item_id, kind
        LIMIT ?
      `).all(tenantId, mailboxId, limit);
      return rows.map(rowToObject);
    },
  };
}

// ---------- Snapshot Repository ----------

export function snapshotRepo(db: DB) {
  return {
    insert(scope: TenantScope, label: string | null, now: Date): number {
      const res = db
        .prepare("INSERT INTO snapshots (scope, label, status, started_at) VALUES (?, ?, 'running', ?)")
        .run(scope, label, now.toISOString());
      return Number(res.lastInsertRowid);
    },

    find(id: number): Snapshot | null {
      const row = db.prepare<[number], SnapshotRow>("SELECT * FROM snapshots WHERE id = ?").get(id);
      return row ? rowToSnapshot(row) : null;
    },

    findRunning(scope: TenantScope): Snapshot | null {
      const row = db
        .prepare<[string], SnapshotRow>("SELECT * FROM snapshots WHERE scope = ? AND status = 'running'")
        .get(scope);
      return row ? rowToSnapshot(row) : null;
    },

    findAllRunning(): Snapshot[] {
      const rows = db
        .prepare<[], SnapshotRow>("SELECT * FROM snapshots WHERE status = 'running' ORDER BY id")
        .all();
      return rows.map(rowToSnapshot);
    },

    /** Moves a running snapshot to a terminal status. Returns false if it was not running. */
    finish(id: number, status: Exclude<SnapshotStatus, "running">, reason: string | null, counters: RunCounters, now: Date): boolean {
      const res = db.prepare(`
        UPDATE snapshots
        SET status = ?, finished_at = ?, failure_reason = ?, items_processed = ?, items_skipped = ?
        WHERE id = ? AND status = 'running'
      `).run(status, now.toISOString(), reason, counters.itemsProcessed, counters.itemsSkipped, id);
      return res.changes > 0;
    },

    findComplete(scope: TenantScope): Snapshot[] {
      const sql = scope === "all"
        ? "SELECT * FROM snapshots WHERE status = 'complete' ORDER BY id DESC"
        : "SELECT * FROM snapshots WHERE status = 'complete' AND scope IN (?, 'all') ORDER BY id DESC";
      const stmt = db.prepare<string[], SnapshotRow>(sql);
      const rows = scope === "all" ? stmt.all() : stmt.all(scope);
      return rows.map(rowToSnapshot);
    },

    findByExactScope(scope: TenantScope): Snapshot[] {
      const rows = db
        .prepare<[string], SnapshotRow>("SELECT * FROM snapshots WHERE scope = ? ORDER BY id DESC")
        .all(scope);
      return rows.map(rowToSnapshot);
    },

    delete(id: number): void {
      db.prepare("DELETE FROM snapshots WHERE id = ?").run(id);
    },

    insertItem(item: SnapshotItem): boolean {
      const res = db.prepare(`
        INSERT INTO snapshot_items (snapshot_id, tenant_id, mailbox_id, item_id, kind, digest, provider_modified_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT DO NOTHING
      `).run(
        item.snapshotId,
        ...identityParams(item),
        item.digest,
        item.providerModifiedAt?.toISOString() ?? null,
      );
      return res.changes > 0;
    },

    findItem(snapshotId: number, identity: ItemIdentity): SnapshotItem | null {
      const row = db
        .prepare<[number, string, string, string, string], SnapshotItemRow>(
          `SELECT * FROM snapshot_items WHERE snapshot_id = ? AND ${IDENTITY_WHERE}`,
        )
        .get(snapshotId, ...identityParams(identity));
      return row ? rowToSnapshotItem(row) : null;
    },

    findItemsPage(snapshotId: number, after: ItemIdentity | null, limit: number): SnapshotItem[] {
      const cursor: [string, string, string, string] = after ? identityParams(after) : ["", "", "", ""];
      const rows = db.prepare<[number, string, string, string, string, number], SnapshotItemRow>(`
        SELECT * FROM snapshot_items
        WHERE snapshot_id = ? AND (tenant_id, mailbox_id, item_id, kind) > (?, ?, ?, ?)
        ORDER BY tenant_id, mailbox_id, item_id, kind
        LIMIT ?
      `).all(snapshotId, ...cursor, limit);
      return rows.map(rowToSnapshotItem);
    },

    countItems(snapshotId: number): number {
      const row = db
        .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM snapshot_items WHERE snapshot_id = ?")
        .get(snapshotId);
      return row?.n ?? 0;
    },

    insertSkipped(snapshotId: number, identity: ItemIdentity, reason: string, now: Date): void {
      db.prepare(`
        INSERT INTO skipped_items (snapshot_id, tenant_id, mailbox_id, item_id, kind, reason, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(snapshotId, ...identityParams(identity), reason, now.toISOString());
    },

    findSkipped(snapshotId: number): SkippedItem[] {
      const rows = db
        .prepare<[number], SkippedRow>("SELECT * FROM skipped_items WHERE snapshot_id = ? ORDER BY id")
        .all(snapshotId);
      return rows.map(rowToSkipped);
    },

    hasUnresolvedSkip(identity: ItemIdentity): boolean {
      const row = db
        .prepare<[string, string, string, string], { n: number }>(
          `SELECT COUNT(*) AS n FROM skipped_items WHERE ${IDENTITY_WHERE} AND resolved_at IS NULL`,
        )
        .get(...identityParams(identity));
      return (row?.n ?? 0) > 0;
    },

    resolveSkipped(identity: ItemIdentity, now: Date): number {
      const res = db.prepare(`
        UPDATE skipped_items SET resolved_at = ? WHERE ${IDENTITY_WHERE} AND resolved_at IS NULL
      `).run(now.toISOString(), ...identityParams(identity));
      return res.changes;
    },
  };
}

// ---------- Row types ----------

interface BlobRow {
  digest: string;
  size: number;
  storage_ref: string;
  ref_count: number;
  created_at: string;
  touched_at: string;
}

interface ObjectRow {
  tenant_id: string;
  mailbox_id: string;
  item_id: string;
  kind: string;
  digest: string;
  size: number;
  provider_modified_at: string | null;
  first_seen_at: string;
  last_seen_at: string;
  tombstoned_at: string | null;
  metadata: string;
}

interface SnapshotRow {
  id: number;
  scope: string;
  label: string | null;
  status: string;
  started_at: string;
  finished_at: string | null;
  failure_reason: string | null;
  items_processed: number;
  items_skipped: number;
}

interface SnapshotItemRow {
  snapshot_id: number;
  tenant_id: string;
  mailbox_id: string;
  item_id: string;
  kind: string;
  digest: string;
  provider_modified_at: string | null;
}

interface SkippedRow {
  id: number;
  snapshot_id: number;
  tenant_id: string;
  mailbox_id: string;
  item_id: string;
  kind: string;
  reason: string;
  recorded_at: string;
  resolved_at: string | null;
}

function toKind(value: string): ItemKind {
  return value === "attachment" ? "attachment" : "message";
}

function toStatus(value: string): SnapshotStatus {
  if (value === "complete" || value === "failed") return value;
  return "running";
}

function toDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function rowToBlob(row: BlobRow): ContentBlob {
  return {
    digest: row.digest,
    size: row.size,
    storageRef: row.storage_ref,
    refCount: row.ref_count,
    createdAt: new Date(row.created_at),
    touchedAt: new Date(row.touched_at),
  };
}

function rowToObject(row: ObjectRow): ObjectEntry {
  return {
    tenantId: row.tenant_id,
    mailboxId: row.mailbox_id,
    itemId: row.item_id,
    kind: toKind(row.kind),
    digest: row.digest,
    size: row.size,
    providerModifiedAt: toDate(row.provider_modified_at),
    firstSeenAt: new Date(row.first_seen_at),
    lastSeenAt: new Date(row.last_seen_at),
    tombstonedAt: toDate(row.tombstoned_at),
    metadata: JSON.parse(row.metadata) as ItemMetadata,
  };
}

function rowToSnapshot(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    scope: row.scope,
    label: row.label,
    status: toStatus(row.status),
    startedAt: new Date(row.started_at),
    finishedAt: toDate(row.finished_at),
    failureReason: row.failure_reason,
    itemsProcessed: row.items_processed,
    itemsSkipped: row.items_skipped,
  };
}

function rowToSnapshotItem(row: SnapshotItemRow): SnapshotItem {
  return {
    snapshotId: row.snapshot_id,
    tenantId: row.tenant_id,
    mailboxId: row.mailbox_id,
    itemId: row.item_id,
    kind: toKind(row.kind),
    digest: row.digest,
    providerModifiedAt: toDate(row.provider_modified_at),
  };
}

function rowToSkipped(row: SkippedRow): SkippedItem {
  return {
    snapshotId: row.snapshot_id,
    tenantId: row.tenant_id,
    mailboxId: row.mailbox_id,
    itemId: row.item_id,
    kind: toKind(row.kind),
    reason: row.reason,
    recordedAt: new Date(row.recorded_at),
    resolvedAt: toDate(row.resolved_at),
  };
}
