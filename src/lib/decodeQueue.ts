/**
 * Bounded, deduplicating task queue for thumbnail decodes.
 *
 * - One task per key: enqueueing a key that is pending or active does not add work.
 *   Re-enqueueing a pending key moves it to the front, since the newest request is
 *   the row the user is looking at now.
 * - Newest first (LIFO): during a fast scroll the rows that just came into view
 *   decode before the ones that already left.
 * - `isWanted(key)` is asked right before a task starts; unwanted tasks are dropped
 *   and reported through `onDrop` so the caller can forget its pending marker.
 */

export type DecodeTask = {
  key: string;
  run: () => Promise<void>;
  onError?: (error: unknown) => void;
  onDrop?: () => void;
};

export interface DecodeQueueOptions {
  concurrency?: number;
  isWanted?: (key: string) => boolean;
}

const DEFAULT_CONCURRENCY = 2;

function normalizeConcurrency(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_CONCURRENCY;
  }
  return Math.max(1, Math.floor(value));
}

export class DecodeQueue {
  private readonly pendingByKey = new Map<string, DecodeTask>();
  private readonly activeKeys = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private isWanted: ((key: string) => boolean) | null;
  private disposed = false;

  constructor(options: DecodeQueueOptions = {}) {
    this.concurrency = normalizeConcurrency(options.concurrency);
    this.isWanted = options.isWanted ?? null;
  }

  get pendingCount(): number {
    return this.pendingByKey.size;
  }

  get activeCount(): number {
    return this.activeKeys.size;
  }

  has(key: string): boolean {
    return this.activeKeys.has(key) || this.pendingByKey.has(key);
  }

  setVisibilityCheck(isWanted: ((key: string) => boolean) | null): void {
    this.isWanted = isWanted;
  }

  /** Returns false when the key was already queued or running (the request coalesced). */
  enqueue(task: DecodeTask): boolean {
    if (this.disposed) {
      return false;
    }

    if (this.activeKeys.has(task.key)) {
      return false;
    }

    const existing = this.pendingByKey.get(task.key);
    if (existing) {
      this.pendingByKey.delete(task.key);
      this.pendingByKey.set(task.key, existing);
      return false;
    }

    this.pendingByKey.set(task.key, task);
    this.pump();
    return true;
  }

  /** Resolves once nothing is pending or running. */
  idle(): Promise<void> {
    if (this.pendingByKey.size === 0 && this.activeKeys.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Drop every pending task; running ones finish normally. */
  clearPending(): void {
    for (const task of this.pendingByKey.values()) {
      task.onDrop?.();
    }
    this.pendingByKey.clear();
    this.notifyIfIdle();
  }

  dispose(): void {
    this.disposed = true;
    this.pendingByKey.clear();
    this.notifyIfIdle();
  }

  private takeNewest(): DecodeTask | null {
    let newest: DecodeTask | null = null;
    for (const task of this.pendingByKey.values()) {
      newest = task;
    }
    if (newest) {
      this.pendingByKey.delete(newest.key);
    }
    return newest;
  }

  private notifyIfIdle(): void {
    if (this.pendingByKey.size > 0 || this.activeKeys.size > 0) {
      return;
    }
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }

  private pump(): void {
    if (this.disposed) {
      return;
    }

    while (this.activeKeys.size < this.concurrency && this.pendingByKey.size > 0) {
      const task = this.takeNewest();
      if (!task) {
        return;
      }

      if (this.isWanted && !this.isWanted(task.key)) {
        task.onDrop?.();
        continue;
      }

      this.activeKeys.add(task.key);

      void Promise.resolve()
        .then(() => task.run())
        .catch((error) => {
          task.onError?.(error);
        })
        .finally(() => {
          this.activeKeys.delete(task.key);
          this.pump();
          this.notifyIfIdle();
        });
    }

    this.notifyIfIdle();
  }
}
