/**
 * Shared fixtures: an in-memory database, an in-memory blob storage with
 * injectable write failures and delays, and a settable clock.
 */
import { openDb } from "../db.js";
import type { DB } from "../db.js";
import { IpcBus } from "../ipc.js";
import { IngestionCoordinator } from "../ingest/coordinator.js";
import type { CoordinatorOptions } from "../ingest/coordinator.js";
import type { BlobStorage } from "../store/blob-storage.js";
import { ContentStore } from "../store/content-store.js";
import { ObjectIndex } from "../store/object-index.js";
import { SnapshotManager } from "../store/snapshot-manager.js";
import type { FetchedRecord, ItemIdentity, ItemKind } from "../types.js";

export class MemoryBlobStorage implements BlobStorage {
  readonly blobs = new Map<string, Buffer>();
  writes = 0;
  /** Number of upcoming writes that throw. */
  failNextWrites = 0;
  /** While set, writes wait for it to settle. */
  writeGate: Promise<void> | null = null;

  async write(digest: string, bytes: Buffer): Promise<string> {
    this.writes++;
    if (this.writeGate) await this.writeGate;
    if (this.failNextWrites > 0) {
      this.failNextWrites--;
      throw new Error("disk full");
    }
    const ref = `mem/${digest}`;
    this.blobs.set(ref, Buffer.from(bytes));
    return ref;
  }

  async read(storageRef: string): Promise<Buffer | null> {
    return this.blobs.get(storageRef) ?? null;
  }

  async remove(storageRef: string): Promise<void> {
    this.blobs.delete(storageRef);
  }
}

export class TestClock {
  private current: Date;

  constructor(start = "2026-03-01T00:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestStack {
  db: DB;
  storage: MemoryBlobStorage;
  clock: TestClock;
  bus: IpcBus;
  store: ContentStore;
  index: ObjectIndex;
  snapshots: SnapshotManager;
  coordinator: IngestionCoordinator;
}

export function makeStack(options: CoordinatorOptions = {}): TestStack {
  const db = openDb(":memory:");
  const storage = new MemoryBlobStorage();
  const clock = new TestClock();
  const bus = new IpcBus();
  const store = new ContentStore(db, storage, { writeAttempts: 3, writeRetryDelayMs: 0, now: clock.now });
  const index = new ObjectIndex(db, { now: clock.now });
  const snapshots = new SnapshotManager(db, { now: clock.now });
  const coordinator = new IngestionCoordinator(store, index, snapshots, { bus, ...options });
  return { db, storage, clock, bus, store, index, snapshots, coordinator };
}

export function ident(tenantId: string, mailboxId: string, itemId: string, kind: ItemKind = "message"): ItemIdentity {
  return { tenantId, mailboxId, itemId, kind };
}

export function fetched(identity: ItemIdentity, content: string, modifiedAt: string | null = null): FetchedRecord {
  return {
    ...identity,
    status: "fetched",
    bytes: Buffer.from(content, "utf-8"),
    providerModifiedAt: modifiedAt ? new Date(modifiedAt) : null,
  };
}

export async function* streamOf<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}
