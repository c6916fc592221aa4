export type MailVaultErrorCode =
  | "NotFound"
  | "AlreadyRunning"
  | "InvalidState"
  | "StorageWriteFailure"
  | "FetchFailure";

export class MailVaultError extends Error {
  readonly code: MailVaultErrorCode;

  constructor(code: MailVaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/** Digest or identity absent. The caller decides the fallback. */
export class NotFoundError extends MailVaultError {
  constructor(message: string) {
    super("NotFound", message);
  }
}

/** A snapshot for the same scope is still running. Retry later, not immediately. */
export class AlreadyRunningError extends MailVaultError {
  readonly scope: string;
  readonly runningSnapshotId: number;

  constructor(scope: string, runningSnapshotId: number) {
    super("AlreadyRunning", `Snapshot ${runningSnapshotId} is still running for scope "${scope}"`);
    this.scope = scope;
    this.runningSnapshotId = runningSnapshotId;
  }
}

export class InvalidStateError extends MailVaultError {
  constructor(message: string) {
    super("InvalidState", message);
  }
}

export class StorageWriteFailure extends MailVaultError {
  readonly digest: string;
  readonly attempts: number;

  constructor(digest: string, attempts: number, cause: unknown) {
    super(
      "StorageWriteFailure",
      `Writing blob ${digest} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      { cause },
    );
    this.digest = digest;
    this.attempts = attempts;
  }
}

export class FetchFailure extends MailVaultError {
  constructor(message: string, cause?: unknown) {
    super("FetchFailure", message, { cause });
  }
}

export function isMailVaultError(err: unknown, code?: MailVaultErrorCode): err is MailVaultError {
  return err instanceof MailVaultError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
