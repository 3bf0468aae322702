/**
 * Scan coordinator.
 *
 * Architecture: zustand vanilla store + an ordered event channel.
 * - Store state is the current ScanSession (status, counters, current target);
 *   anything that only needs the latest state (a status bar) subscribes to the store.
 * - `subscribe(listener)` delivers every ScanEvent in order: `started`, throttled
 *   `progress`, then exactly one terminal `completed | cancelled | failed`.
 *
 * Lifecycle: idle → running → completed | cancelled | failed. A bad root goes
 * straight idle → failed. The terminal status stays visible until the next
 * startScan() or reset(). A cancel() that arrives while the root is still
 * being checked is held and ends the session cancelled before any file is read.
 *
 * Ingest loop: walker → MetadataStore.upsert, one file at a time. A file is
 * "processed" only after its upsert returned, and cancellation is checked only
 * between files, so a cancel never lands mid-write.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
  DiscoveredFile,
  FinishedScanStatus,
  MediaRecordInput,
  ScanEvent,
  ScanListener,
  ScanStatus,
  ScanSummary,
  WalkFailure,
} from '../types';
import { classify as defaultClassify, type Classifier } from '../lib/classifier';
import { AlreadyRunningError, errorCode, formatError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { MetadataStore } from '../lib/metadataStore';
import { resolveScanRoot, walk } from '../lib/walker';

const logger = createLogger('scan');

export const DEFAULT_PROGRESS_INTERVAL_MS = 100;

export interface ScanStoreDeps {
  store: MetadataStore;
  classify?: Classifier;
  /** Minimum gap between progress events; 0 emits one per file. */
  progressIntervalMs?: number;
  /** When false, `unknown` files are counted as skipped instead of stored. */
  ingestUnknown?: boolean;
  now?: () => number;
}

export interface ScanSession {
  status: ScanStatus;
  rootPath: string | null;
  currentTarget: string | null;
  processed: number;
  inserted: number;
  skipped: number;
  failures: WalkFailure[];
  error: string | null;
  startedAt: number | null;
  lastSummary: ScanSummary | null;
}

export interface ScanStore extends ScanSession {
  startScan: (rootPath: string) => Promise<ScanStatus>;
  cancel: () => void;
  reset: () => void;
  subscribe: (listener: ScanListener) => () => void;
  waitForIdle: () => Promise<void>;
}

const idleSession: ScanSession = {
  status: 'idle',
  rootPath: null,
  currentTarget: null,
  processed: 0,
  inserted: 0,
  skipped: 0,
  failures: [],
  error: null,
  startedAt: null,
  lastSummary: null,
};

export function isScanActive(status: ScanStatus): boolean {
  return status === 'running' || status === 'cancelling';
}

function toRecordInput(file: DiscoveredFile): MediaRecordInput {
  return {
    path: file.path,
    filename: file.filename,
    extension: file.extension,
    fileType: file.fileType,
    size: file.size,
    modifiedAt: file.modifiedAt,
  };
}

/**
 * Coalesces progress events: at most one per interval, latest wins.
 * flush() emits whatever is held, so nothing is lost before the terminal event.
 */
class ProgressThrottle {
  private held: Extract<ScanEvent, { type: 'progress' }> | null = null;
  private lastEmitAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number,
    private readonly emit: (event: ScanEvent) => void,
  ) {}

  push(event: Extract<ScanEvent, { type: 'progress' }>): void {
    const at = this.now();
    if (this.intervalMs <= 0 || at - this.lastEmitAt >= this.intervalMs) {
      this.held = null;
      this.lastEmitAt = at;
      this.emit(event);
      return;
    }
    this.held = event;
  }

  flush(): void {
    if (!this.held) return;
    const event = this.held;
    this.held = null;
    this.lastEmitAt = this.now();
    this.emit(event);
  }
}

export function createScanStore(deps: ScanStoreDeps): StoreApi<ScanStore> {
  const classify = deps.classify ?? defaultClassify;
  const progressIntervalMs = deps.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  const ingestUnknown = deps.ingestUnknown ?? true;
  const now = deps.now ?? Date.now;

  const listeners = new Set<ScanListener>();
  let starting = false;
  let cancelRequested = false;
  let pendingStart: Promise<ScanStatus> | null = null;
  let activeRun: Promise<void> | null = null;

  const emit = (event: ScanEvent) => {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error('listener threw', { event: event.type, error: formatError(error) });
      }
    }
  };

  return createStore<ScanStore>((set, get) => {
    const summarize = (status: FinishedScanStatus, error: string | null): ScanSummary => {
      const state = get();
      return {
        rootPath: state.rootPath ?? '',
        status,
        processed: state.processed,
        inserted: state.inserted,
        skipped: state.skipped,
        failures: state.failures.length,
        startedAt: state.startedAt ?? now(),
        finishedAt: now(),
        error,
      };
    };

    const recordFailure = (failure: WalkFailure) => {
      logger.warn('skipped entry', { path: failure.path, code: failure.code, error: failure.message });
      set((state) => ({ failures: [...state.failures, failure] }));
    };

    const finish = (status: FinishedScanStatus, error: string | null, throttle: ProgressThrottle | null) => {
      throttle?.flush();
      const summary = summarize(status, error);
      set({ status, error, currentTarget: null, lastSummary: summary });
      logger.info(`scan ${status}`, {
        rootPath: summary.rootPath,
        processed: summary.processed,
        inserted: summary.inserted,
        skipped: summary.skipped,
        failures: summary.failures,
        ...(error ? { error } : {}),
      });

      if (status === 'completed') {
        emit({ type: 'completed', summary });
      } else if (status === 'cancelled') {
        emit({ type: 'cancelled', summary });
      } else {
        emit({ type: 'failed', rootPath: summary.rootPath, reason: error ?? 'unknown error', summary });
      }
    };

    const ingest = (file: DiscoveredFile): void => {
      if (file.fileType === 'unknown' && !ingestUnknown) {
        set((state) => ({ currentTarget: file.path, processed: state.processed + 1, skipped: state.skipped + 1 }));
        return;
      }

      let added = false;
      let failed = false;
      try {
        added = deps.store.upsert(toRecordInput(file));
      } catch (error) {
        failed = true;
        recordFailure({ path: file.path, code: errorCode(error), message: formatError(error) });
      }

      set((state) => ({
        currentTarget: file.path,
        processed: state.processed + 1,
        inserted: state.inserted + (added ? 1 : 0),
        skipped: state.skipped + (failed ? 1 : 0),
      }));
    };

    const run = async (root: string): Promise<void> => {
      const throttle = new ProgressThrottle(progressIntervalMs, now, emit);
      // Cancelled while the root was being checked.
      if (get().status === 'cancelling') {
        finish('cancelled', null, throttle);
        return;
      }
      try {
        for await (const file of walk(root, { classify, onError: recordFailure })) {
          ingest(file);
          const { processed, inserted, skipped } = get();
          throttle.push({ type: 'progress', path: file.path, processed, inserted, skipped });

          // Checkpoint: the current file's upsert is done.
          if (get().status === 'cancelling') {
            break;
          }
        }
      } catch (error) {
        finish('failed', formatError(error), throttle);
        return;
      }

      finish(get().status === 'cancelling' ? 'cancelled' : 'completed', null, throttle);
    };

    const begin = async (rootPath: string): Promise<ScanStatus> => {
      set({ ...idleSession, rootPath, startedAt: now(), lastSummary: get().lastSummary });

      let root: string;
      try {
        root = await resolveScanRoot(rootPath);
      } catch (error) {
        starting = false;
        finish('failed', formatError(error), null);
        return 'failed';
      }

      set({ status: cancelRequested ? 'cancelling' : 'running', rootPath: root });
      starting = false;
      cancelRequested = false;
      logger.info('scan started', { rootPath: root });
      emit({ type: 'started', rootPath: root });

      activeRun = run(root).finally(() => {
        activeRun = null;
      });
      return 'running';
    };

    return {
      ...idleSession,

      startScan: async (rootPath: string) => {
        if (starting || isScanActive(get().status)) {
          throw new AlreadyRunningError(get().rootPath);
        }
        starting = true;
        cancelRequested = false;
        pendingStart = begin(rootPath);
        try {
          return await pendingStart;
        } finally {
          pendingStart = null;
        }
      },

      cancel: () => {
        if (starting) {
          logger.info('cancel requested before start', { rootPath: get().rootPath });
          cancelRequested = true;
          return;
        }
        if (get().status !== 'running') return;
        logger.info('cancel requested', { rootPath: get().rootPath });
        set({ status: 'cancelling' });
      },

      reset: () => {
        if (starting || isScanActive(get().status)) return;
        set({ ...idleSession, lastSummary: get().lastSummary });
      },

      subscribe: (listener: ScanListener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },

      waitForIdle: async () => {
        if (pendingStart) {
          await pendingStart;
        }
        if (activeRun) {
          await activeRun;
        }
      },
    };
  });
}
