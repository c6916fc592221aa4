import { z } from "zod";

// ---------- Identity ----------

export const ItemKindSchema = z.enum(["message", "attachment"]);
export type ItemKind = z.infer<typeof ItemKindSchema>;

export const ItemIdentitySchema = z.object({
  tenantId: z.string().min(1),
  mailboxId: z.string().min(1),
  itemId: z.string().min(1),
  kind: ItemKindSchema,
});

export type ItemIdentity = z.infer<typeof ItemIdentitySchema>;

/** "all" spans every tenant; anything else is a single tenant id. */
export type TenantScope = string;
export const ALL_TENANTS: TenantScope = "all";

export function identityKey(identity: ItemIdentity): string {
  return [identity.tenantId, identity.mailboxId, identity.itemId, identity.kind]
    .map((part) => encodeURIComponent(part))
    .join("/");
}

/** Strips everything but the identity fields from a record or entry. */
export function pickIdentity(identity: ItemIdentity): ItemIdentity {
  return {
    tenantId: identity.tenantId,
    mailboxId: identity.mailboxId,
    itemId: identity.itemId,
    kind: identity.kind,
  };
}

export function scopeIncludes(scope: TenantScope, tenantId: string): boolean {
  return scope === ALL_TENANTS || scope === tenantId;
}

// ---------- Content Blob ----------

export interface ContentBlob {
  digest: string;
  size: number;
  storageRef: string;
  refCount: number;
  createdAt: Date;
  touchedAt: Date;
}

export interface PutResult {
  digest: string;
  wasNew: boolean;
}

export interface ReclaimResult {
  removed: string[];
  bytesFreed: number;
}

// ---------- Object Entry ----------

export type ItemMetadata = Record<string, string | number | boolean | null>;

export interface ObjectEntry extends ItemIdentity {
  digest: string;
  size: number;
  providerModifiedAt: Date | null;
  firstSeenAt: Date;
  lastSeenAt: Date;
  tombstonedAt: Date | null;
  metadata: ItemMetadata;
}

export type UpsertOutcome = "created" | "updated" | "unchanged";

export interface UpsertResult {
  outcome: UpsertOutcome;
  entry: ObjectEntry;
  /** Digest the entry pointed to before an update, otherwise null. */
  previousDigest: string | null;
}

// ---------- Snapshot ----------

export type SnapshotStatus = "running" | "complete" | "failed";

export interface Snapshot {
  id: number;
  scope: TenantScope;
  /** Free-form name given when the run was started, e.g. "before migration". */
  label: string | null;
  status: SnapshotStatus;
  startedAt: Date;
  finishedAt: Date | null;
  failureReason: string | null;
  itemsProcessed: number;
  itemsSkipped: number;
}

export interface SnapshotItem extends ItemIdentity {
  snapshotId: number;
  digest: string;
  providerModifiedAt: Date | null;
}

export interface SkippedItem extends ItemIdentity {
  snapshotId: number;
  reason: string;
  recordedAt: Date;
  resolvedAt: Date | null;
}

export interface RunCounters {
  itemsProcessed: number;
  itemsSkipped: number;
}

/** A cheap listing entry: what the provider has, without the bytes. */
export interface ItemRef extends ItemIdentity {
  providerModifiedAt: Date | null;
}

// ---------- Source records ----------

export interface FetchedRecord extends ItemRef {
  status: "fetched";
  bytes: Buffer;
  metadata?: ItemMetadata;
}

export interface UnchangedRecord extends ItemRef {
  status: "unchanged";
}

export interface DeletedRecord extends ItemIdentity {
  status: "deleted";
}

export interface FailedRecord extends ItemIdentity {
  status: "failed";
  error: string;
}

export type SourceRecord = FetchedRecord | UnchangedRecord | DeletedRecord | FailedRecord;

// ---------- Run ----------

export type RunStatus = "complete" | "failed";

export interface RunResult {
  snapshotId: number;
  scope: TenantScope;
  status: RunStatus;
  itemsProcessed: number;
  itemsSkipped: number;
  itemsTombstoned: number;
  error?: string;
}
