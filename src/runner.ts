import type { MailSource, RecordsOptions } from "./channels/email/source.js";
import type { IngestionCoordinator } from "./ingest/coordinator.js";
import type { SnapshotManager } from "./store/snapshot-manager.js";
import { ALL_TENANTS } from "./types.js";
import type { RunResult, SourceRecord, TenantScope } from "./types.js";

export interface BackupRunnerOptions {
  /** Completed snapshots kept per scope; 0 keeps all. */
  snapshotRetention?: number;
}

export interface RunScopeOptions {
  signal?: AbortSignal;
  /** Name stored on the snapshot. */
  label?: string | null;
}

export interface TenantSources {
  /** Tenant ids of the active tenants. */
  activeTenants(): string[];
  /** Throws NotFoundError for an unknown tenant. */
  sourceFor(tenantId: string): MailSource;
}

/**
 * One backup run for a tenant scope: resolves the sources, plans against
 * the latest completed snapshot and hands the records to the coordinator.
 */
export class BackupRunner {
  private readonly coordinator: IngestionCoordinator;
  private readonly snapshots: SnapshotManager;
  private readonly tenants: TenantSources;
  private readonly snapshotRetention: number;

  constructor(
    coordinator: IngestionCoordinator,
    snapshots: SnapshotManager,
    tenants: TenantSources,
    options: BackupRunnerOptions = {},
  ) {
    this.coordinator = coordinator;
    this.snapshots = snapshots;
    this.tenants = tenants;
    this.snapshotRetention = options.snapshotRetention ?? 0;
  }

  /** Throws AlreadyRunningError when the scope is busy. */
  async runScope(scope: TenantScope, options: RunScopeOptions = {}): Promise<RunResult> {
    const tenantIds = scope === ALL_TENANTS ? this.tenants.activeTenants() : [scope];
    const sources = tenantIds.map((id) => this.tenants.sourceFor(id));

    const base = this.snapshots.latestComplete(scope);
    const recordsOptions: RecordsOptions = {
      shouldFetch: base ? this.snapshots.planner(scope, base.id) : undefined,
      signal: options.signal,
    };
    if (base) {
      console.log(`[runner] Scope "${scope}": incremental against snapshot ${base.id}`);
    } else {
      console.log(`[runner] Scope "${scope}": full run, no completed snapshot yet`);
    }

    const result = await this.coordinator.run(scope, concatRecords(sources, recordsOptions), {
      signal: options.signal,
      label: options.label,
      // "all" would also cover deactivated tenants that no source lists.
      reconcileDeletions: scope !== ALL_TENANTS && sources.every((s) => s.completeListing),
    });

    if (result.status === "complete") {
      const removed = this.snapshots.prune(scope, this.snapshotRetention);
      if (removed.length > 0) {
        console.log(`[runner] Scope "${scope}": pruned snapshot(s) ${removed.join(", ")}`);
      }
    }
    return result;
  }
}

async function* concatRecords(sources: MailSource[], options: RecordsOptions): AsyncGenerator<SourceRecord> {
  for (const source of sources) {
    yield* source.records(options);
  }
}
