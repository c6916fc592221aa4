#!/usr/bin/env node
import "dotenv/config";
import type http from "http";
import { GraphClient, GraphMailSource, TenantConfigStore, tenantFromEnv } from "./channels/email/index.js";
import type { TenantConfig } from "./channels/email/index.js";
import { loadConfig } from "./config.js";
import { openDb } from "./db.js";
import { NotFoundError, errorMessage } from "./errors.js";
import { IngestionCoordinator } from "./ingest/coordinator.js";
import { ipcBus } from "./ipc.js";
import { BackupRunner } from "./runner.js";
import type { TenantSources } from "./runner.js";
import { Scheduler } from "./scheduler.js";
import { startServer } from "./server.js";
import { FsBlobStorage } from "./store/blob-storage.js";
import { ContentStore } from "./store/content-store.js";
import { ObjectIndex } from "./store/object-index.js";
import { SnapshotManager } from "./store/snapshot-manager.js";
import { ALL_TENANTS } from "./types.js";

// ---------- Setup ----------

const config = loadConfig();
const db = openDb(config.dbPath);

const store = new ContentStore(db, new FsBlobStorage(config.blobDir), {
  writeAttempts: config.store.writeAttempts,
  writeRetryDelayMs: config.store.writeRetryDelayMs,
});
const index = new ObjectIndex(db);
const snapshots = new SnapshotManager(db);
const coordinator = new IngestionCoordinator(store, index, snapshots, config.ingest);
const registry = new TenantConfigStore(config.dataDir);

/** Registry tenants, or the single tenant from TENANT_ID/CLIENT_ID/CLIENT_SECRET. */
function activeTenants(): TenantConfig[] {
  const registered = registry.listActive();
  if (registered.length > 0) return registered;
  const fromEnv = tenantFromEnv();
  return fromEnv ? [fromEnv] : [];
}

const tenants: TenantSources = {
  activeTenants: () => activeTenants().map((t) => t.tenantId),
  sourceFor: (tenantId) => {
    const tenant = activeTenants().find((t) => t.tenantId === tenantId);
    if (!tenant) throw new NotFoundError(`No active tenant "${tenantId}"`);
    return new GraphMailSource(tenant, config.fetch);
  },
};

const runner = new BackupRunner(coordinator, snapshots, tenants, {
  snapshotRetention: config.snapshotRetention,
});

const scheduler = new Scheduler(runner, {
  hours: config.scheduleHours,
  scopes: () => tenants.activeTenants(),
  reclaim: () => store.reclaim({ graceMs: config.store.reclaimGraceMs }),
});

// ---------- Events ----------

ipcBus.subscribe("run:failed", (event) => {
  console.error(`[MailVault] Run for "${event.payload.scope}" failed: ${event.payload.error ?? "unknown"}`);
});

// ---------- Commands ----------

let httpServer: http.Server | null = null;

function serve(): void {
  console.log("[MailVault] Starting...");
  // Only the long-running service owns snapshots left running by a crash.
  const interrupted = snapshots.failInterrupted();
  if (interrupted.length > 0) {
    console.warn(`[MailVault] Marked interrupted snapshot(s) ${interrupted.join(", ")} as failed`);
  }
  httpServer = startServer({ store, index, snapshots, running: () => scheduler.running }, config.port);
  scheduler.start();
  console.log(`[MailVault] Started. ${tenants.activeTenants().length} active tenant(s), schedule (UTC): ${config.scheduleHours.join(", ")}`);
}

async function runOnce(scope: string, label: string | null): Promise<number> {
  const controller = new AbortController();
  const cancel = (): void => controller.abort();
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  try {
    const result = await runner.runScope(scope, { signal: controller.signal, label });
    console.log(JSON.stringify(result, null, 2));
    return result.status === "complete" ? 0 : 1;
  } finally {
    process.off("SIGINT", cancel);
    process.off("SIGTERM", cancel);
  }
}

async function reclaimOnce(): Promise<number> {
  const result = await store.reclaim({ graceMs: config.store.reclaimGraceMs });
  console.log(`[MailVault] Reclaimed ${result.removed.length} blob(s), ${result.bytesFreed} bytes`);
  return 0;
}

function listTenants(): number {
  console.log(JSON.stringify(registry.listRedacted(), null, 2));
  return 0;
}

/** Checks the TENANT_ID/CLIENT_ID/CLIENT_SECRET tenant against Graph, then stores it encrypted. */
async function addTenantFromEnv(): Promise<number> {
  const tenant = tenantFromEnv();
  if (!tenant) {
    console.error("[MailVault] Set TENANT_ID, CLIENT_ID and CLIENT_SECRET (and optionally TENANT_NAME)");
    return 1;
  }

  const check = await new GraphClient(tenant).testConnection();
  if (!check.success) {
    console.error(`[MailVault] Connection test failed: ${check.error ?? "unknown error"}`);
    return 1;
  }

  registry.upsert(tenant);
  console.log(`[MailVault] Tenant "${tenant.name}" (${tenant.tenantId}) saved`);
  return 0;
}

/** Excludes the tenant from future runs; its backed-up items stay. */
function deactivateTenant(tenantId: string | undefined): number {
  if (!tenantId) {
    console.error("Usage: mailvault tenants deactivate <tenantId>");
    return 2;
  }
  registry.deactivate(tenantId);
  console.log(`[MailVault] Tenant ${tenantId} deactivated`);
  return 0;
}

function tenantsCommand(sub: string | undefined, arg: string | undefined): Promise<number> | number {
  switch (sub) {
    case undefined:
      return listTenants();
    case "add":
      return addTenantFromEnv();
    case "deactivate":
      return deactivateTenant(arg);
    default:
      console.error(`Unknown tenants command: ${sub}`);
      return 2;
  }
}

// ---------- Startup & shutdown ----------

let shuttingDown = false;

/** Waits for cancelled runs to fail their snapshots before the database closes. */
async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log("[MailVault] Shutting down...");
  await scheduler.stop();
  if (httpServer) {
    httpServer.close();
  }
  db.close();
  console.log("[MailVault] Shutdown complete");
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err: unknown) => {
    console.error("[MailVault] Shutdown failed:", errorMessage(err));
    process.exit(1);
  });
}

async function main(argv: string[]): Promise<number | null> {
  const [command = "serve", arg, arg2] = argv;
  switch (command) {
    case "serve":
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);
      serve();
      return null;
    case "run":
      return runOnce(arg ?? ALL_TENANTS, arg2 ?? null);
    case "reclaim":
      return reclaimOnce();
    case "tenants":
      return tenantsCommand(arg, arg2);
    default:
      console.error(
        "Usage: mailvault [serve | run [tenantId|all] [label] | reclaim | tenants [add | deactivate <tenantId>]]",
      );
      return 2;
  }
}

process.on("unhandledRejection", (reason) => {
  console.error("[MailVault] Unhandled rejection:", reason);
});

main(process.argv.slice(2))
  .then((code) => {
    if (code !== null) {
      db.close();
      process.exit(code);
    }
  })
  .catch((err: unknown) => {
    console.error("[MailVault] Fatal:", errorMessage(err));
    db.close();
    process.exit(1);
  });
