/**
 * Walker tests against real temp trees.
 *
 * Coverage targets:
 * - Deterministic depth-first order, unknown files still emitted
 * - Symlinked files resolve to their real path; directory cycles terminate
 * - Per-entry failures (broken links, unreadable directories) are reported and skipped
 * - A bad or blank root throws
 * - Independent traversals per call
 */
import path from 'node:path';
import fse from 'fs-extra';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { walk, resolveScanRoot } from '../walker';
import { createClassifier } from '../classifier';
import { PathNotFoundError } from '../errors';
import { createMockTree, createTempDir } from '../../mock/generateMockData';
import type { DiscoveredFile, WalkFailure } from '../../types';

// -- Helpers --

const roots: string[] = [];

async function tree(...args: Parameters<typeof createMockTree>): Promise<string> {
  const root = await createMockTree(...args);
  roots.push(root);
  return root;
}

async function collect(root: string, failures: WalkFailure[] = []): Promise<DiscoveredFile[]> {
  const files: DiscoveredFile[] = [];
  for await (const file of walk(root, { onError: (failure) => failures.push(failure) })) {
    files.push(file);
  }
  return files;
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(roots.splice(0).map((root) => fse.remove(root)));
});

// ============================================================
// ORDER & CLASSIFICATION
// ============================================================

describe('walk', () => {
  it('emits every file depth-first in name order', async () => {
    const root = await tree([
      { kind: 'file', path: 'b.mp4' },
      { kind: 'file', path: 'a.jpg' },
      { kind: 'file', path: 'sub/z.png' },
      { kind: 'file', path: 'sub/deeper/y.gif' },
      { kind: 'file', path: 'c.txt' },
    ]);

    const files = await collect(root);

    expect(files.map((f) => path.relative(root, f.path))).toEqual([
      'a.jpg',
      'b.mp4',
      'c.txt',
      path.join('sub', 'deeper', 'y.gif'),
      path.join('sub', 'z.png'),
    ]);
  });

  it('emits unknown files with type unknown', async () => {
    const root = await tree([
      { kind: 'file', path: 'a.jpg' },
      { kind: 'file', path: 'notes.txt' },
    ]);

    const files = await collect(root);

    expect(files.map((f) => [f.filename, f.fileType])).toEqual([
      ['a.jpg', 'image'],
      ['notes.txt', 'unknown'],
    ]);
  });

  it('fills in extension, size and mtime', async () => {
    const root = await tree([{ kind: 'file', path: 'Clip.MP4', contents: '12345' }]);

    const [file] = await collect(root);

    expect(file).toMatchObject({
      path: path.join(root, 'Clip.MP4'),
      filename: 'Clip.MP4',
      extension: '.mp4',
      fileType: 'video',
      size: 5,
    });
    expect(file?.modifiedAt).toBeGreaterThan(0);
  });

  it('uses the classifier it is given', async () => {
    const root = await tree([{ kind: 'file', path: 'a.jpg' }]);
    const onlyVideos = createClassifier({ imageExtensions: [], videoExtensions: ['.jpg'] });

    const files: DiscoveredFile[] = [];
    for await (const file of walk(root, { classify: onlyVideos })) files.push(file);

    expect(files[0]?.fileType).toBe('video');
  });

  it('yields nothing for an empty directory', async () => {
    const root = await tree([]);
    expect(await collect(root)).toEqual([]);
  });
});

// ============================================================
// SYMLINKS
// ============================================================

describe('walk with symlinks', () => {
  it('resolves a symlinked file to the real path', async () => {
    const root = await tree([
      { kind: 'file', path: 'a.jpg' },
      { kind: 'symlink', path: 'links/alias.jpg', target: '../a.jpg' },
    ]);

    const files = await collect(root);

    expect(files.map((f) => f.path)).toEqual([path.join(root, 'a.jpg'), path.join(root, 'a.jpg')]);
  });

  it('visits each real directory once, even through a cycle', async () => {
    const root = await tree([
      { kind: 'file', path: 'photos/p.jpg' },
      { kind: 'symlink', path: 'photos/loop', target: '..' },
      { kind: 'symlink', path: 'again', target: 'photos' },
    ]);

    const files = await collect(root);

    expect(files.map((f) => f.path)).toEqual([path.join(root, 'photos', 'p.jpg')]);
  });

  it('reports a broken symlink and keeps going', async () => {
    const root = await tree([
      { kind: 'symlink', path: 'broken.jpg', target: 'missing.jpg' },
      { kind: 'file', path: 'ok.png' },
    ]);
    const failures: WalkFailure[] = [];

    const files = await collect(root, failures);

    expect(files.map((f) => f.filename)).toEqual(['ok.png']);
    expect(failures).toEqual([
      {
        path: path.join(root, 'broken.jpg'),
        code: 'PATH_NOT_FOUND',
        message: `Path ${path.join(root, 'broken.jpg')} does not exist`,
      },
    ]);
  });
});

// ============================================================
// UNREADABLE DIRECTORIES
// ============================================================

describe('walk with unreadable directories', () => {
  it('reports a directory it cannot list and still emits its siblings', async () => {
    const root = await tree([
      { kind: 'file', path: 'a.jpg' },
      { kind: 'file', path: 'locked/hidden.jpg' },
      { kind: 'file', path: 'z.png' },
    ]);
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const listDirectory = fse.readdir;
    // First call lists the root, the second one is `locked`.
    vi.spyOn(fse, 'readdir').mockImplementationOnce(listDirectory).mockRejectedValueOnce(denied);
    const failures: WalkFailure[] = [];

    const files = await collect(root, failures);

    expect(files.map((f) => f.filename)).toEqual(['a.jpg', 'z.png']);
    expect(failures).toEqual([
      {
        path: path.join(root, 'locked'),
        code: 'PERMISSION_DENIED',
        message: `Permission denied: ${path.join(root, 'locked')}`,
      },
    ]);
  });
});

// ============================================================
// ROOT HANDLING
// ============================================================

describe('root handling', () => {
  it('throws PathNotFoundError for a missing root before yielding', async () => {
    const parent = await createTempDir();
    roots.push(parent);
    const missing = path.join(parent, 'nope');

    await expect(collect(missing)).rejects.toBeInstanceOf(PathNotFoundError);
  });

  it('rejects a blank root instead of scanning the working directory', async () => {
    await expect(resolveScanRoot('')).rejects.toThrow('Path "" does not exist');
    await expect(collect('   ')).rejects.toBeInstanceOf(PathNotFoundError);
  });

  it('rejects a root that is a file', async () => {
    const root = await tree([{ kind: 'file', path: 'a.jpg' }]);
    const filePath = path.join(root, 'a.jpg');

    await expect(resolveScanRoot(filePath)).rejects.toThrow(`Path ${filePath} is not a directory`);
  });

  it('resolves a symlinked root to its real path', async () => {
    const root = await tree([
      { kind: 'dir', path: 'real' },
      { kind: 'symlink', path: 'alias', target: 'real' },
    ]);

    expect(await resolveScanRoot(path.join(root, 'alias'))).toBe(path.join(root, 'real'));
  });

  it('each call is an independent traversal', async () => {
    const root = await tree([
      { kind: 'file', path: 'a.jpg' },
      { kind: 'file', path: 'sub/b.jpg' },
    ]);

    const first = await collect(root);
    const second = await collect(root);

    expect(second).toEqual(first);
    expect(second).toHaveLength(2);
  });
});
