import { createHash } from "crypto";
import { blobRepo } from "../db.js";
import type { DB } from "../db.js";
import { InvalidStateError, NotFoundError, StorageWriteFailure } from "../errors.js";
import type { ContentBlob, PutResult, ReclaimResult } from "../types.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";
import type { BlobStorage } from "./blob-storage.js";

export interface ContentStoreOptions {
  /** Physical write attempts per blob before StorageWriteFailure (default: 3). */
  writeAttempts?: number;
  /** Backoff before the second write attempt, doubled each time (default: 200ms). */
  writeRetryDelayMs?: number;
  now?: () => Date;
}

/** SHA-256 over the raw bytes only, lower-case hex. */
export function hashContent(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Content-addressed blob store. Owns the physical bytes and their reference
 * counts; identical bytes are stored once no matter which tenant, mailbox or
 * item they came from.
 */
export class ContentStore {
  private readonly blobs: ReturnType<typeof blobRepo>;
  private readonly storage: BlobStorage;
  private readonly locks = new KeyedLock();
  private readonly writeAttempts: number;
  private readonly writeRetryDelayMs: number;
  private readonly now: () => Date;

  constructor(db: DB, storage: BlobStorage, options: ContentStoreOptions = {}) {
    this.blobs = blobRepo(db);
    this.storage = storage;
    this.writeAttempts = options.writeAttempts ?? 3;
    this.writeRetryDelayMs = options.writeRetryDelayMs ?? 200;
    this.now = options.now ?? (() => new Date());
  }

  hash(bytes: Uint8Array): string {
    return hashContent(bytes);
  }

  /**
   * Stores the bytes on first sight, otherwise only counts one more reference.
   * Concurrent callers with identical bytes queue on the digest, so exactly
   * one of them writes and each adds one reference.
   */
  async put(bytes: Buffer): Promise<PutResult> {
    const digest = hashContent(bytes);

    return this.locks.run(digest, async () => {
      if (this.blobs.increment(digest, this.now())) {
        return { digest, wasNew: false };
      }

      const storageRef = await this.writeWithRetry(digest, bytes);
      this.blobs.insert(digest, bytes.length, storageRef, this.now());
      return { digest, wasNew: true };
    });
  }

  async get(digest: string): Promise<Buffer> {
    const blob = this.blobs.find(digest);
    if (!blob) {
      throw new NotFoundError(`Blob ${digest} not found`);
    }
    const bytes = await this.storage.read(blob.storageRef);
    if (!bytes) {
      throw new NotFoundError(`Blob ${digest} is catalogued but its bytes are missing`);
    }
    return bytes;
  }

  has(digest: string): boolean {
    return this.blobs.find(digest) !== null;
  }

  stat(digest: string): ContentBlob | null {
    return this.blobs.find(digest);
  }

  /** Adds a reference to bytes that are already stored. */
  retain(digest: string): void {
    if (!this.blobs.increment(digest, this.now())) {
      throw new NotFoundError(`Cannot retain blob ${digest}: not stored`);
    }
  }

  /**
   * Drops one reference. A blob at zero stays on disk until a later
   * `reclaim` pass finds it outside the grace window.
   */
  release(digest: string): void {
    if (this.blobs.decrement(digest, this.now())) return;

    if (!this.blobs.find(digest)) {
      throw new NotFoundError(`Cannot release blob ${digest}: not stored`);
    }
    throw new InvalidStateError(`Cannot release blob ${digest}: reference count is already 0`);
  }

  /**
   * Mark-and-sweep over unreferenced blobs. A blob is removed only when it has
   * no references, has not been touched for `graceMs`, and no retained
   * snapshot records its digest.
   */
  async reclaim(options: { graceMs: number }): Promise<ReclaimResult> {
    const cutoff = new Date(this.now().getTime() - options.graceMs);
    const candidates = this.blobs.findReclaimable(cutoff);
    const result: ReclaimResult = { removed: [], bytesFreed: 0 };

    for (const blob of candidates) {
      await this.locks.run(blob.digest, async () => {
        if (!this.blobs.deleteUnreferenced(blob.digest, cutoff)) return;
        await this.storage.remove(blob.storageRef);
        result.removed.push(blob.digest);
        result.bytesFreed += blob.size;
      });
    }

    if (result.removed.length > 0) {
      console.log(`[store] Reclaimed ${result.removed.length} blob(s), ${result.bytesFreed} bytes`);
    }
    return result;
  }

  totals(): { blobs: number; bytes: number } {
    return this.blobs.totals();
  }

  private async writeWithRetry(digest: string, bytes: Buffer): Promise<string> {
    try {
      return await withRetry(() => this.storage.write(digest, bytes), {
        attempts: this.writeAttempts,
        delayMs: this.writeRetryDelayMs,
        onRetry: (attempt, err) => {
          console.warn(`[store] Write of ${digest} failed (attempt ${attempt}/${this.writeAttempts}):`, err);
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new StorageWriteFailure(digest, err.attempts, err.lastError);
      }
      throw err;
    }
  }
}
