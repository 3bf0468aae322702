/**
 * ThumbnailCache tests.
 *
 * Coverage targets:
 * - Non-blocking get() with placeholders per file type
 * - One decode per path, results (and failures) memoized
 * - Real sharp decodes stay inside the bounding box
 * - Ready notifications, visibility drops, clear() during a decode
 */
import path from 'node:path';
import fse from 'fs-extra';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { PLACEHOLDERS, ThumbnailCache, type ThumbnailDecoder } from '../thumbnailCache';
import { createMockTree } from '../../mock/generateMockData';
import type { DecodedThumbnail, Thumbnail } from '../../types';

// -- Test fixtures --

const roots: string[] = [];
const caches: ThumbnailCache[] = [];

function fakeImage(filePath: string, size: number): DecodedThumbnail {
  return { kind: 'image', width: size, height: size, format: 'jpeg', data: Buffer.from(filePath) };
}

function fakeDecoder() {
  return vi.fn<ThumbnailDecoder>(async (filePath, maxSize) => fakeImage(filePath, maxSize));
}

function gatedDecoder() {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const decode = vi.fn<ThumbnailDecoder>(async (filePath, maxSize) => {
    await gate;
    return fakeImage(filePath, maxSize);
  });
  return { decode, release: () => release() };
}

function makeCache(options: ConstructorParameters<typeof ThumbnailCache>[0] = {}): ThumbnailCache {
  const cache = new ThumbnailCache(options);
  caches.push(cache);
  return cache;
}

function expectImage(thumbnail: Thumbnail | undefined): DecodedThumbnail {
  if (thumbnail?.kind !== 'image') {
    throw new Error(`expected an image, got ${JSON.stringify(thumbnail)}`);
  }
  return thumbnail;
}

afterEach(async () => {
  for (const cache of caches.splice(0)) cache.dispose();
  await Promise.all(roots.splice(0).map((root) => fse.remove(root)));
});

// ============================================================
// PLACEHOLDERS & MEMOIZATION
// ============================================================

describe('ThumbnailCache.get', () => {
  it('returns pending for an image miss, then the decoded image', async () => {
    const decode = fakeDecoder();
    const cache = makeCache({ decode, maxSize: 64 });

    expect(cache.get('/m/a.jpg', 'image')).toBe(PLACEHOLDERS.pending);
    await cache.idle();

    const image = expectImage(cache.get('/m/a.jpg', 'image'));
    expect(image.width).toBe(64);
    expect(decode).toHaveBeenCalledWith('/m/a.jpg', 64);
  });

  it('coalesces repeated requests into one decode', async () => {
    const decode = fakeDecoder();
    const cache = makeCache({ decode });

    cache.get('/m/a.jpg', 'image');
    cache.get('/m/a.jpg', 'image');
    cache.get('/m/a.jpg', 'image');
    await cache.idle();
    cache.get('/m/a.jpg', 'image');

    expect(decode).toHaveBeenCalledTimes(1);
  });

  it('serves video and unknown files a placeholder without decoding', () => {
    const decode = fakeDecoder();
    const cache = makeCache({ decode });

    expect(cache.get('/m/clip.mp4', 'video')).toBe(PLACEHOLDERS.video);
    expect(cache.get('/m/notes.txt', 'unknown')).toBe(PLACEHOLDERS.file);
    expect(decode).not.toHaveBeenCalled();
    expect(cache.size).toBe(0);
  });

  it('remembers a failed decode and does not retry it', async () => {
    const decode = vi.fn<ThumbnailDecoder>(async () => {
      throw new Error('bad bytes');
    });
    const cache = makeCache({ decode });

    cache.get('/m/broken.jpg', 'image');
    await cache.idle();

    expect(cache.get('/m/broken.jpg', 'image')).toBe(PLACEHOLDERS.failed);
    expect(cache.peek('/m/broken.jpg')).toEqual({ status: 'failed', reason: 'bad bytes' });
    await cache.idle();
    expect(decode).toHaveBeenCalledTimes(1);
  });
});

// ============================================================
// SHARP DECODER
// ============================================================

describe('ThumbnailCache with sharp', () => {
  it('fits a large image inside the bounding box', async () => {
    const root = await createMockTree([{ kind: 'image', path: 'wide.png', width: 320, height: 200 }]);
    roots.push(root);
    const cache = makeCache({ maxSize: 100 });
    const filePath = path.join(root, 'wide.png');

    cache.get(filePath, 'image');
    await cache.idle();

    const image = expectImage(cache.get(filePath, 'image'));
    expect(image.width).toBe(100);
    expect(image.height).toBeLessThanOrEqual(100);
    expect(image.format).toBe('jpeg');
    expect(image.data.length).toBeGreaterThan(0);
  });

  it('does not upscale a small image', async () => {
    const root = await createMockTree([{ kind: 'image', path: 'small.png', width: 40, height: 30 }]);
    roots.push(root);
    const cache = makeCache({ maxSize: 100 });
    const filePath = path.join(root, 'small.png');

    cache.get(filePath, 'image');
    await cache.idle();

    const image = expectImage(cache.get(filePath, 'image'));
    expect([image.width, image.height]).toEqual([40, 30]);
  });

  it('marks a corrupt file as failed', async () => {
    const root = await createMockTree([{ kind: 'file', path: 'fake.jpg', contents: 'not an image' }]);
    roots.push(root);
    const cache = makeCache();
    const filePath = path.join(root, 'fake.jpg');

    cache.get(filePath, 'image');
    await cache.idle();

    const entry = cache.peek(filePath);
    expect(entry?.status).toBe('failed');
    expect(entry?.status === 'failed' && entry.reason.startsWith(`Could not decode ${filePath}`)).toBe(true);
  });
});

// ============================================================
// NOTIFICATIONS & LIFECYCLE
// ============================================================

describe('ThumbnailCache lifecycle', () => {
  it('notifies ready listeners and survives one that throws', async () => {
    const cache = makeCache({ decode: fakeDecoder(), maxSize: 8 });
    const seen: string[] = [];
    cache.onReady(() => {
      throw new Error('listener bug');
    });
    const unsubscribe = cache.onReady((filePath, thumbnail) => {
      seen.push(`${filePath}:${thumbnail.kind}`);
    });

    cache.get('/m/a.jpg', 'image');
    await cache.idle();
    unsubscribe();
    cache.get('/m/b.jpg', 'image');
    await cache.idle();

    expect(seen).toEqual(['/m/a.jpg:image']);
  });

  it('drops a queued decode that is no longer visible', async () => {
    const { decode, release } = gatedDecoder();
    const cache = makeCache({ decode, concurrency: 1 });

    cache.get('/m/visible.jpg', 'image');
    cache.get('/m/gone.jpg', 'image');
    cache.setVisibilityCheck((filePath) => filePath !== '/m/gone.jpg');
    release();
    await cache.idle();

    expect(decode).toHaveBeenCalledTimes(1);
    expect(cache.peek('/m/gone.jpg')).toBeUndefined();

    cache.setVisibilityCheck(null);
    expect(cache.get('/m/gone.jpg', 'image')).toBe(PLACEHOLDERS.pending);
    await cache.idle();
    expect(cache.peek('/m/gone.jpg')?.status).toBe('ready');
  });

  it('clear() discards a decode that lands afterwards', async () => {
    const { decode, release } = gatedDecoder();
    const cache = makeCache({ decode });
    const listener = vi.fn();
    cache.onReady(listener);

    cache.get('/m/a.jpg', 'image');
    cache.clear();
    release();
    await cache.idle();

    expect(cache.peek('/m/a.jpg')).toBeUndefined();
    expect(listener).not.toHaveBeenCalled();
  });
});
