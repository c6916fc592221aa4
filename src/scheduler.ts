import { errorMessage, isMailVaultError } from "./errors.js";
import { ipcBus } from "./ipc.js";
import type { IpcBus } from "./ipc.js";
import type { BackupRunner } from "./runner.js";
import type { ReclaimResult, RunResult, TenantScope } from "./types.js";

/** The first of `hours` (UTC, 0-23) strictly after `now`. */
export function nextRunAt(hours: number[], now: Date): Date {
  if (hours.length === 0) {
    throw new Error("Schedule needs at least one hour");
  }
  const sorted = [...hours].sort((a, b) => a - b);

  for (const hour of sorted) {
    const candidate = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hour));
    if (candidate.getTime() > now.getTime()) return candidate;
  }
  const first = sorted[0] ?? 0;
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1, first));
}

export interface SchedulerOptions {
  hours: number[];
  /** Scopes started on each trigger; each runs as its own pipeline. */
  scopes: () => TenantScope[];
  /** Out-of-band sweep after the runs of a trigger have settled. */
  reclaim: () => Promise<ReclaimResult>;
  bus?: IpcBus;
  now?: () => Date;
}

/** The part of `BackupRunner` the scheduler drives. */
export type ScopeRunner = Pick<BackupRunner, "runScope">;

export interface TriggerResult {
  runs: RunResult[];
  /** Scopes skipped because an earlier run was still going. */
  busy: TenantScope[];
  reclaimed: ReclaimResult | null;
}

export class Scheduler {
  private readonly runner: ScopeRunner;
  private readonly options: SchedulerOptions;
  private readonly bus: IpcBus;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private readonly active = new Map<TenantScope, AbortController>();
  private readonly inFlight = new Set<Promise<TriggerResult>>();
  private stopping = false;

  constructor(runner: ScopeRunner, options: SchedulerOptions) {
    this.runner = runner;
    this.options = options;
    this.bus = options.bus ?? ipcBus;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.arm();
  }

  /**
   * Cancels the timer and every run still in flight, and resolves once those
   * runs have recorded their outcome. Triggers that settle meanwhile skip
   * their reclaim sweep.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const controller of this.active.values()) {
      controller.abort();
    }
    try {
      await Promise.allSettled([...this.inFlight]);
    } finally {
      this.stopping = false;
    }
  }

  get running(): TenantScope[] {
    return [...this.active.keys()];
  }

  /** Starts every scope now, waits for all of them, then reclaims. */
  trigger(): Promise<TriggerResult> {
    const pending = this.runTrigger();
    this.inFlight.add(pending);
    const settled = (): void => {
      this.inFlight.delete(pending);
    };
    void pending.then(settled, settled);
    return pending;
  }

  private async runTrigger(): Promise<TriggerResult> {
    const scopes = this.options.scopes();
    console.log(`[scheduler] Triggered for ${scopes.length} scope(s)`);
    this.bus.publish("scheduler:triggered", "scheduler", { scopes });

    const outcome: TriggerResult = { runs: [], busy: [], reclaimed: null };
    await Promise.all(scopes.map(async (scope) => {
      const result = await this.runOne(scope);
      if (result === "busy") outcome.busy.push(scope);
      else if (result) outcome.runs.push(result);
    }));

    if (this.stopping) {
      console.log("[scheduler] Stopping, reclamation skipped");
      return outcome;
    }
    try {
      const reclaimed = await this.options.reclaim();
      outcome.reclaimed = reclaimed;
      if (reclaimed.removed.length > 0) {
        this.bus.publish("blob:reclaimed", "scheduler", reclaimed);
      }
    } catch (err) {
      console.error("[scheduler] Reclamation failed:", errorMessage(err));
    }
    return outcome;
  }

  private async runOne(scope: TenantScope): Promise<RunResult | "busy" | null> {
    if (this.active.has(scope)) {
      console.warn(`[scheduler] Scope "${scope}" is still running, skipping this trigger`);
      return "busy";
    }

    const controller = new AbortController();
    this.active.set(scope, controller);
    try {
      return await this.runner.runScope(scope, { signal: controller.signal });
    } catch (err) {
      if (isMailVaultError(err, "AlreadyRunning")) {
        console.warn(`[scheduler] ${err.message}, skipping this trigger`);
        return "busy";
      }
      console.error(`[scheduler] Run for scope "${scope}" could not start:`, errorMessage(err));
      return null;
    } finally {
      this.active.delete(scope);
    }
  }

  private arm(): void {
    const now = this.now();
    const at = nextRunAt(this.options.hours, now);
    console.log(`[scheduler] Next run at ${at.toISOString()}`);

    this.timer = setTimeout(() => {
      this.timer = null;
      this.arm();
      this.trigger().catch((err: unknown) => {
        console.error("[scheduler] Trigger failed:", errorMessage(err));
      });
    }, at.getTime() - now.getTime());
  }
}
