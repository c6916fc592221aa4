import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import type { ItemIdentity, ReclaimResult, RunResult, TenantScope, UpsertOutcome } from "./types.js";

/**
 * In-process event bus. Ingestion pipelines and the scheduler publish
 * progress here; the API forwards every event to WebSocket clients.
 */

export interface ItemStoredEvent {
  snapshotId: number;
  identity: ItemIdentity;
  digest: string;
  outcome: UpsertOutcome;
  wasNew: boolean;
}

export interface ItemSkippedEvent {
  snapshotId: number;
  identity: ItemIdentity;
  reason: string;
}

/** Payload carried by each event type. */
export interface IpcEventPayloads {
  "run:started": { snapshotId: number; scope: TenantScope };
  "run:completed": RunResult;
  "run:failed": RunResult;
  "item:stored": ItemStoredEvent;
  "item:skipped": ItemSkippedEvent;
  "item:tombstoned": { snapshotId: number; identity: ItemIdentity };
  "blob:reclaimed": ReclaimResult;
  "scheduler:triggered": { scopes: TenantScope[] };
}

export type IpcEventType = keyof IpcEventPayloads;

export interface IpcEvent<K extends IpcEventType = IpcEventType> {
  id: string;
  type: K;
  source: string;
  payload: IpcEventPayloads[K];
  timestamp: Date;
}

export class IpcBus extends EventEmitter {
  publish<K extends IpcEventType>(type: K, source: string, payload: IpcEventPayloads[K]): void {
    const event: IpcEvent<K> = {
      id: randomUUID(),
      type,
      source,
      payload,
      timestamp: new Date(),
    };
    this.emit(type, event);
    this.emit("*", event);
  }

  subscribe<K extends IpcEventType>(type: K, listener: (event: IpcEvent<K>) => void): () => void {
    this.on(type, listener);
    return () => this.off(type, listener);
  }

  /** Every event, in publish order; used by the WebSocket bridge. */
  subscribeAll(listener: (event: IpcEvent) => void): () => void {
    this.on("*", listener);
    return () => this.off("*", listener);
  }
}

export const ipcBus = new IpcBus();
ipcBus.setMaxListeners(50);
