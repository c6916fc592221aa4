import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { isMailVaultError } from "./errors.js";
import { ipcBus } from "./ipc.js";
import type { IpcBus, IpcEvent } from "./ipc.js";
import type { ContentStore } from "./store/content-store.js";
import type { ObjectIndex } from "./store/object-index.js";
import type { SnapshotManager } from "./store/snapshot-manager.js";
import { ALL_TENANTS, ItemIdentitySchema } from "./types.js";
import type { SnapshotItem } from "./types.js";

export interface ApiDeps {
  store: ContentStore;
  index: ObjectIndex;
  snapshots: SnapshotManager;
  /** Scopes with a run in flight, shown by /api/status. */
  running?: () => string[];
  bus?: IpcBus;
}

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

class BadRequest extends Error {}

// ---------- HTTP API (read-only) ----------

function handleApi(deps: ApiDeps, req: http.IncomingMessage, res: http.ServerResponse): void {
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");

  if (method === "OPTIONS") {
    res.writeHead(204);
    res.end();
    return;
  }
  if (method !== "GET") {
    return json(res, { error: "Method not allowed" }, 405);
  }

  void route(deps, url, res).catch((err: unknown) => {
    if (isMailVaultError(err, "NotFound")) {
      return json(res, { error: err.message }, 404);
    }
    if (err instanceof BadRequest) {
      return json(res, { error: err.message }, 400);
    }
    console.error("[API] Error:", err);
    json(res, { error: "Internal server error" }, 500);
  });
}

async function route(deps: ApiDeps, url: URL, res: http.ServerResponse): Promise<void> {
  const parts = url.pathname.split("/").filter((p) => p.length > 0).map(decodePart);
  const [, resource, id, sub] = parts;

  if (resource === "status" && parts.length === 2) {
    return json(res, getStatus(deps));
  }

  if (resource === "snapshots" && parts.length === 2) {
    const scope = url.searchParams.get("scope") ?? ALL_TENANTS;
    return json(res, deps.snapshots.listRestoreCandidates(scope));
  }

  if (resource === "snapshots" && id !== undefined && parts.length === 3) {
    const snapshot = deps.snapshots.get(parseId(id));
    return json(res, {
      ...snapshot,
      itemCount: deps.snapshots.countItems(snapshot.id),
      skipped: deps.snapshots.skipped(snapshot.id),
    });
  }

  if (resource === "snapshots" && id !== undefined && sub === "items" && parts.length === 4) {
    const limit = parseLimit(url.searchParams.get("limit"));
    const items: SnapshotItem[] = [];
    for (const item of deps.snapshots.items(parseId(id))) {
      if (items.length >= limit) break;
      items.push(item);
    }
    return json(res, items);
  }

  if (resource === "objects" && parts.length === 2) {
    const identity = ItemIdentitySchema.safeParse({
      tenantId: url.searchParams.get("tenant"),
      mailboxId: url.searchParams.get("mailbox"),
      itemId: url.searchParams.get("item"),
      kind: url.searchParams.get("kind") ?? "message",
    });
    if (!identity.success) {
      throw new BadRequest("Query needs tenant, mailbox, item and an optional kind (message|attachment)");
    }
    return json(res, deps.index.lookup(identity.data));
  }

  if (resource === "mailboxes" && id !== undefined && sub !== undefined && parts.length === 4) {
    return json(res, deps.index.listMailbox(id, sub, parseLimit(url.searchParams.get("limit"))));
  }

  if (resource === "blobs" && id !== undefined && parts.length === 3) {
    if (!DIGEST_PATTERN.test(id)) throw new BadRequest("Digest must be 64 lower-case hex characters");
    const bytes = await deps.store.get(id);
    res.writeHead(200, {
      "Content-Type": "application/octet-stream",
      "Content-Length": bytes.length,
    });
    res.end(bytes);
    return;
  }

  notFound(res);
}

function getStatus(deps: ApiDeps): Record<string, unknown> {
  const latest = deps.snapshots.listRestoreCandidates(ALL_TENANTS)[0] ?? null;
  return {
    timestamp: new Date().toISOString(),
    blobs: deps.store.totals(),
    running: deps.running?.() ?? [],
    latestSnapshot: latest,
  };
}

// ---------- WebSocket (real-time events) ----------

function setupWebSocket(server: http.Server, bus: IpcBus): void {
  const wss = new WebSocketServer({ server, path: "/ws" });
  const wsClients = new Set<WebSocket>();

  wss.on("connection", (ws) => {
    wsClients.add(ws);
    ws.send(JSON.stringify({ type: "connected", timestamp: new Date().toISOString() }));

    ws.on("close", () => wsClients.delete(ws));
    ws.on("error", () => wsClients.delete(ws));
  });

  const unsubscribe = bus.subscribeAll((event: IpcEvent) => {
    const msg = JSON.stringify({
      type: event.type,
      source: event.source,
      payload: event.payload,
      timestamp: event.timestamp.toISOString(),
    });
    for (const client of wsClients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  });

  server.on("close", () => {
    unsubscribe();
    for (const client of wsClients) client.terminate();
    wss.close();
  });
}

// ---------- Helpers ----------

function json(res: http.ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function notFound(res: http.ServerResponse): void {
  json(res, { error: "Not found" }, 404);
}

function decodePart(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    throw new BadRequest(`Malformed path segment: ${part}`);
  }
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) throw new BadRequest(`Invalid snapshot id: ${raw}`);
  return id;
}

function parseLimit(raw: string | null): number {
  if (raw === null) return 500;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > 5000) throw new BadRequest(`Invalid limit: ${raw}`);
  return limit;
}

// ---------- Start ----------

/** Builds the server without listening; `startServer` also binds the port. */
export function createApiServer(deps: ApiDeps): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url?.startsWith("/api/")) {
      handleApi(deps, req, res);
    } else {
      notFound(res);
    }
  });

  setupWebSocket(server, deps.bus ?? ipcBus);
  return server;
}

export function startServer(deps: ApiDeps, port: number): http.Server {
  const server = createApiServer(deps);
  server.listen(port, () => {
    console.log(`[MailVault] API: http://localhost:${port}/api/status`);
  });
  return server;
}
