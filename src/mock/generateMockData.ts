/**
 * Fixture builders for tests: on-disk trees and in-memory records.
 */
import os from 'node:os';
import path from 'node:path';
import fse from 'fs-extra';
import sharp from 'sharp';
import type { FileType, MediaRecord } from '../types';
import { extensionOf } from '../lib/classifier';

export type MockTreeEntry =
  | { kind: 'file'; path: string; contents?: string }
  | { kind: 'image'; path: string; width?: number; height?: number }
  | { kind: 'dir'; path: string }
  | { kind: 'symlink'; path: string; target: string };

/** Fresh temp directory, returned as a real path so it matches walker output. */
export async function createTempDir(prefix = 'media-index-'): Promise<string> {
  const dir = await fse.mkdtemp(path.join(os.tmpdir(), prefix));
  return fse.realpath(dir);
}

/** Solid-colour PNG of the given size. */
export async function writeMockImage(filePath: string, width = 320, height = 200): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  })
    .png()
    .toFile(filePath);
}

/**
 * Build a tree under a new temp dir. Entry paths are relative to the root;
 * symlink targets are relative to the link's own directory, as with `ln -s`.
 */
export async function createMockTree(entries: readonly MockTreeEntry[]): Promise<string> {
  const root = await createTempDir();
  for (const entry of entries) {
    const target = path.join(root, entry.path);
    switch (entry.kind) {
      case 'dir':
        await fse.ensureDir(target);
        break;
      case 'file':
        await fse.outputFile(target, entry.contents ?? `mock ${entry.path}`);
        break;
      case 'image':
        await writeMockImage(target, entry.width, entry.height);
        break;
      case 'symlink':
        await fse.ensureDir(path.dirname(target));
        await fse.symlink(entry.target, target);
        break;
    }
  }
  return root;
}

const fileTypeByExtension: Record<string, FileType> = {
  '.jpg': 'image',
  '.png': 'image',
  '.mp4': 'video',
  '.mov': 'video',
  '.txt': 'unknown',
};

/** Deterministic records `/mock/media/file_0000.<ext>` …, one second apart. */
export function generateMockRecords(count: number, extensions: readonly string[] = ['.jpg', '.mp4']): MediaRecord[] {
  const records: MediaRecord[] = [];
  const start = Date.UTC(2024, 0, 1);
  for (let i = 0; i < count; i++) {
    const ext = extensions[i % extensions.length] ?? '.jpg';
    const filename = `file_${String(i).padStart(4, '0')}${ext}`;
    records.push({
      path: `/mock/media/${filename}`,
      filename,
      extension: extensionOf(filename),
      fileType: fileTypeByExtension[ext] ?? 'unknown',
      size: 1024 * (i + 1),
      modifiedAt: start + i * 1000,
      discoveredAt: start + i * 1000,
    });
  }
  return records;
}
