import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";

/**
 * Physical byte storage keyed by content digest. Implementations must make
 * `write` all-or-nothing: a reader never sees a partial blob under its final
 * reference.
 */
export interface BlobStorage {
  /** Writes the bytes and returns the storage reference recorded for the digest. */
  write(digest: string, bytes: Buffer): Promise<string>;
  read(storageRef: string): Promise<Buffer | null>;
  remove(storageRef: string): Promise<void>;
}

/**
 * Directory-backed blob storage, sharded by the first two byte pairs of the
 * digest: `<root>/ab/cd/abcd…`. Writes go to a temp file that is renamed
 * into place.
 */
export class FsBlobStorage implements BlobStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  refFor(digest: string): string {
    return path.join(digest.slice(0, 2), digest.slice(2, 4), digest);
  }

  async write(digest: string, bytes: Buffer): Promise<string> {
    const ref = this.refFor(digest);
    const target = this.resolve(ref);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });

    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await fs.promises.writeFile(tmp, bytes, { flag: "wx" });
      await fs.promises.rename(tmp, target);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      throw err;
    }
    return ref;
  }

  async read(storageRef: string): Promise<Buffer | null> {
    try {
      return await fs.promises.readFile(this.resolve(storageRef));
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async remove(storageRef: string): Promise<void> {
    await fs.promises.rm(this.resolve(storageRef), { force: true });
  }

  private resolve(storageRef: string): string {
    const full = path.resolve(this.root, storageRef);
    if (!full.startsWith(this.root + path.sep)) {
      throw new Error(`Storage reference escapes blob root: ${storageRef}`);
    }
    return full;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
