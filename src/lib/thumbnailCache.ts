/**
 * Lazy, memoizing thumbnail cache.
 *
 * `get()` never waits: a ready entry comes back as the decoded image, anything
 * else as a placeholder. Image misses schedule exactly one decode per path
 * (coalesced by DecodeQueue); the result, success or failure, is kept for the
 * life of the process. Failed paths are not retried.
 *
 * Entries are only touched from the event loop, and the "is it cached / is it
 * queued" check plus the pending marker happen before any await, so two callers
 * can never both start a decode for the same path.
 *
 * No eviction: memory grows with the number of distinct images shown. Known
 * limitation; clear() drops everything.
 */
import sharp from 'sharp';
import type {
  DecodedThumbnail,
  FileType,
  PlaceholderKind,
  PlaceholderThumbnail,
  Thumbnail,
  ThumbnailEntry,
} from '../types';
import { DecodeQueue } from './decodeQueue';
import { DecodeFailureError, formatError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('thumb-cache');

export const DEFAULT_THUMBNAIL_SIZE = 100;
const JPEG_QUALITY = 80;

export type ThumbnailDecoder = (path: string, maxSize: number) => Promise<DecodedThumbnail>;

export type ThumbnailReadyListener = (path: string, thumbnail: Thumbnail) => void;

export interface ThumbnailCacheOptions {
  maxSize?: number;
  concurrency?: number;
  decode?: ThumbnailDecoder;
  isWanted?: (path: string) => boolean;
}

export const PLACEHOLDERS: Readonly<Record<PlaceholderKind, PlaceholderThumbnail>> = {
  pending: { kind: 'placeholder', placeholder: 'pending' },
  failed: { kind: 'placeholder', placeholder: 'failed' },
  video: { kind: 'placeholder', placeholder: 'video' },
  file: { kind: 'placeholder', placeholder: 'file' },
};

/** Decode with sharp: honour EXIF orientation, fit inside maxSize², never upscale. */
export const decodeWithSharp: ThumbnailDecoder = async (path, maxSize) => {
  try {
    const { data, info } = await sharp(path)
      .rotate()
      .resize(maxSize, maxSize, { fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer({ resolveWithObject: true });
    return { kind: 'image', width: info.width, height: info.height, format: 'jpeg', data };
  } catch (error) {
    throw new DecodeFailureError(path, { cause: error });
  }
};

export class ThumbnailCache {
  private readonly entries = new Map<string, ThumbnailEntry>();
  private readonly listeners = new Set<ThumbnailReadyListener>();
  private readonly queue: DecodeQueue;
  private readonly decode: ThumbnailDecoder;
  readonly maxSize: number;

  constructor(options: ThumbnailCacheOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_THUMBNAIL_SIZE;
    this.decode = options.decode ?? decodeWithSharp;
    this.queue = new DecodeQueue({
      concurrency: options.concurrency,
      isWanted: options.isWanted,
    });
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: string, fileType: FileType): Thumbnail {
    const entry = this.entries.get(path);
    if (entry?.status === 'pending') {
      // Already queued or decoding: only bump its priority.
      this.schedule(path);
      return PLACEHOLDERS.pending;
    }
    if (entry) {
      return entryToThumbnail(entry);
    }

    if (fileType === 'video') return PLACEHOLDERS.video;
    if (fileType === 'unknown') return PLACEHOLDERS.file;

    this.entries.set(path, { status: 'pending' });
    this.schedule(path);
    return PLACEHOLDERS.pending;
  }

  /** Current entry without scheduling anything. */
  peek(path: string): ThumbnailEntry | undefined {
    return this.entries.get(path);
  }

  onReady(listener: ThumbnailReadyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Replace the visibility check used to skip decodes for rows scrolled out of view. */
  setVisibilityCheck(isWanted: ((path: string) => boolean) | null): void {
    this.queue.setVisibilityCheck(isWanted);
  }

  /** Resolves once every scheduled decode has settled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Forget every entry and pending request. Decodes already running still land. */
  clear(): void {
    this.queue.clearPending();
    this.entries.clear();
  }

  dispose(): void {
    this.queue.dispose();
    this.entries.clear();
    this.listeners.clear();
  }

  private schedule(path: string): void {
    this.queue.enqueue({
      key: path,
      run: async () => {
        const startedAt = Date.now();
        const image = await this.decode(path, this.maxSize);
        logger.debug('decoded', { path, durationMs: Date.now() - startedAt });
        this.settle(path, { status: 'ready', image });
      },
      onError: (error) => {
        const reason = formatError(error);
        logger.warn('decode failed', { path, error: reason });
        this.settle(path, { status: 'failed', reason });
      },
      onDrop: () => {
        // Scrolled away before its turn: forget the marker so it is asked for again.
        if (this.entries.get(path)?.status === 'pending') {
          this.entries.delete(path);
        }
      },
    });
  }

  private settle(path: string, entry: Exclude<ThumbnailEntry, { status: 'pending' }>): void {
    // clear() ran while this decode was in flight.
    if (!this.entries.has(path)) {
      return;
    }
    this.entries.set(path, entry);
    const thumbnail = entryToThumbnail(entry);
    for (const listener of this.listeners) {
      try {
        listener(path, thumbnail);
      } catch (error) {
        logger.error('ready listener threw', { path, error: formatError(error) });
      }
    }
  }
}

function entryToThumbnail(entry: ThumbnailEntry): Thumbnail {
  switch (entry.status) {
    case 'ready':
      return entry.image;
    case 'failed':
      return PLACEHOLDERS.failed;
    case 'pending':
      return PLACEHOLDERS.pending;
  }
}
