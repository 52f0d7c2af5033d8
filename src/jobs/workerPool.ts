import type { StructuredLogger } from "../logger.js";

/** Number of slots used when the caller does not configure one. */
export const DEFAULT_POOL_SIZE = 4;

/** Unit of work executed by a slot. Rejections are logged, never rethrown. */
export type PoolTask = () => Promise<void>;

export type PoolEntryState = "queued" | "running" | "settled" | "withdrawn";

export interface WorkerPoolOptions {
  /** Number of concurrent slots. Values below one are rejected. */
  readonly size?: number;
  /** Logger receiving task failures; failures are otherwise invisible. */
  readonly logger?: StructuredLogger;
}

/** Handle returned by {@link JobWorkerPool.submit}. */
export interface PoolHandle {
  readonly id: string;
  /** Resolves once the task settled or was withdrawn from the queue. */
  readonly done: Promise<void>;
  readonly state: PoolEntryState;
  /** Withdraws the task while it still waits in the queue. */
  cancel(): boolean;
}

/** Snapshot of the pool counters exposed to the stats endpoint. */
export interface WorkerPoolStatistics {
  readonly size: number;
  readonly active: number;
  readonly queued: number;
  readonly executed: number;
  readonly failed: number;
}

interface PoolEntry {
  readonly id: string;
  readonly task: PoolTask;
  state: PoolEntryState;
  resolve: () => void;
}

/**
 * Fixed-size set of execution slots with FIFO admission. A slot runs one task
 * to completion before taking the next one. Tasks are never interrupted: the
 * pool has no way to stop a running task, cancellation is up to the task.
 */
export class JobWorkerPool {
  readonly size: number;
  private readonly logger: StructuredLogger | null;
  private readonly queue: PoolEntry[] = [];
  private readonly running = new Set<PoolEntry>();
  private idleWaiters: Array<() => void> = [];
  private pumpScheduled = false;
  private closed = false;
  private executed = 0;
  private failed = 0;

  constructor(options: WorkerPoolOptions = {}) {
    const size = options.size ?? DEFAULT_POOL_SIZE;
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`worker pool size must be a positive integer (received ${size})`);
    }
    this.size = size;
    this.logger = options.logger ?? null;
  }

  /**
   * Queues {@link task}. The call returns before the task starts, even when a
   * slot is free: admission happens on a later microtask.
   */
  submit(id: string, task: PoolTask): PoolHandle {
    if (this.closed) {
      throw new Error("worker pool is closed");
    }

    let resolve!: () => void;
    const done = new Promise<void>((settle) => {
      resolve = settle;
    });
    const entry: PoolEntry = { id, task, state: "queued", resolve };
    this.queue.push(entry);
    this.schedulePump();

    return {
      id,
      done,
      get state() {
        return entry.state;
      },
      cancel: () => this.withdraw(entry),
    };
  }

  /** Resolves once no task is queued or running. */
  drain(): Promise<void> {
    if (this.queue.length === 0 && this.running.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops admission and withdraws every queued task. Running tasks keep their
   * slot until they return. Returns the withdrawn identifiers.
   */
  close(): string[] {
    this.closed = true;
    const withdrawn = [...this.queue];
    for (const entry of withdrawn) {
      this.withdraw(entry);
    }
    return withdrawn.map((entry) => entry.id);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStatistics(): WorkerPoolStatistics {
    return {
      size: this.size,
      active: this.running.size,
      queued: this.queue.length,
      executed: this.executed,
      failed: this.failed,
    };
  }

  private withdraw(entry: PoolEntry): boolean {
    if (entry.state !== "queued") {
      return false;
    }
    const index = this.queue.indexOf(entry);
    if (index >= 0) {
      this.queue.splice(index, 1);
    }
    entry.state = "withdrawn";
    entry.resolve();
    this.notifyIdle();
    return true;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) {
      return;
    }
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.running.size < this.size) {
      const entry = this.queue.shift();
      if (!entry) {
        break;
      }
      this.start(entry);
    }
  }

  private start(entry: PoolEntry): void {
    entry.state = "running";
    this.running.add(entry);
    void this.runEntry(entry);
  }

  private async runEntry(entry: PoolEntry): Promise<void> {
    try {
      await entry.task();
    } catch (error) {
      this.failed += 1;
      this.logger?.error("worker_task_failed", { task_id: entry.id, error });
    } finally {
      this.executed += 1;
      this.running.delete(entry);
      entry.state = "settled";
      entry.resolve();
      this.pump();
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.queue.length > 0 || this.running.size > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
