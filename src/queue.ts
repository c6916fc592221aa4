import { EventEmitter } from "events";

export interface PoolOptions {
  concurrency?: number;
}

type ItemHandler<T> = (item: T) => Promise<void>;

/**
 * Bounded pool of concurrent workers. `push` applies backpressure: it only
 * resolves once the item fits into the pool, so a producer reading a lazy
 * stream never runs ahead of the workers.
 *
 * Events: enqueued, started, completed (item, ms), failed (item, error), idle.
 */
export class WorkerPool<T> extends EventEmitter {
  private readonly concurrency: number;
  private readonly handler: ItemHandler<T>;
  private running = 0;
  private readonly waiting: T[] = [];
  private capacityWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(handler: ItemHandler<T>, options: PoolOptions = {}) {
    super();
    this.handler = handler;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
  }

  /** Waits for a free slot, then enqueues. */
  async push(item: T): Promise<void> {
    while (this.running + this.waiting.length >= this.concurrency) {
      await new Promise<void>((resolve) => this.capacityWaiters.push(resolve));
    }
    this.enqueue(item);
  }

  private enqueue(item: T): void {
    this.waiting.push(item);
    this.emit("enqueued", item);
    this.drain();
  }

  /** Resolves once nothing is waiting or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  get activeCount(): number {
    return this.running;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0;
  }

  private drain(): void {
    while (this.running < this.concurrency && this.waiting.length > 0) {
      const item = this.waiting.shift();
      if (item === undefined) break;
      this.running++;
      this.process(item);
    }
  }

  private process(item: T): void {
    this.emit("started", item);

    const start = Date.now();
    void this.handler(item)
      .then(() => {
        this.emit("completed", item, Date.now() - start);
      })
      .catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        this.emit("failed", item, error);
      })
      .finally(() => {
        this.running--;
        this.notify();
        this.drain();
      });
  }

  private notify(): void {
    const capacity = this.capacityWaiters;
    this.capacityWaiters = [];
    for (const resolve of capacity) resolve();

    if (this.isIdle()) {
      const idle = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of idle) resolve();
      this.emit("idle");
    }
  }
}
