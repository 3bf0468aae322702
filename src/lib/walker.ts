/**
 * Recursive filesystem walker.
 *
 * `walk(root)` is an async generator: the consumer pulls one DiscoveredFile at a
 * time, so a slow consumer throttles the traversal and stopping the iteration
 * stops the walk. Each call is an independent traversal with its own visited set.
 *
 * - Depth-first, entries sorted by name → the same tree always yields the same order.
 * - Symlinks are followed, but each real directory is entered once per walk, so
 *   link cycles terminate. Emitted paths are real paths.
 * - Every regular file is emitted, `unknown` ones included; filtering is the
 *   consumer's call.
 * - Unreadable directories and unresolvable entries go to `onError`; the walk
 *   continues with their siblings. Only a bad root throws.
 */
import path from 'node:path';
import fse from 'fs-extra';
import type { DiscoveredFile, WalkFailure } from '../types';
import { classify as defaultClassify, extensionOf, type Classifier } from './classifier';
import { PathNotFoundError, errorCode, formatError, toPathError } from './errors';

export interface WalkOptions {
  classify?: Classifier;
  onError?: (failure: WalkFailure) => void;
}

interface WalkContext {
  visited: Set<string>;
  classify: Classifier;
  report: (entryPath: string, error: unknown) => void;
}

/**
 * Resolve `rootPath` to the real path of a readable directory.
 * Throws PathNotFoundError / PermissionDeniedError otherwise.
 */
export async function resolveScanRoot(rootPath: string): Promise<string> {
  // path.resolve('') would be the working directory.
  if (!rootPath.trim()) {
    throw new PathNotFoundError(rootPath);
  }
  const absolute = path.resolve(rootPath);
  let realRoot: string;
  try {
    realRoot = await fse.realpath(absolute);
    const stats = await fse.stat(realRoot);
    if (!stats.isDirectory()) {
      throw new PathNotFoundError(absolute, 'is not a directory');
    }
    await fse.access(realRoot, fse.constants.R_OK | fse.constants.X_OK);
  } catch (error) {
    throw toPathError(absolute, error);
  }
  return realRoot;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function* visitDirectory(dir: string, ctx: WalkContext): AsyncGenerator<DiscoveredFile> {
  if (ctx.visited.has(dir)) return;
  ctx.visited.add(dir);

  let names: string[];
  try {
    names = await fse.readdir(dir);
  } catch (error) {
    ctx.report(dir, error);
    return;
  }
  names.sort(compareNames);

  for (const name of names) {
    const entryPath = path.join(dir, name);
    let target: string;
    let stats: fse.Stats;
    try {
      target = await fse.realpath(entryPath);
      stats = await fse.stat(target);
    } catch (error) {
      ctx.report(entryPath, error);
      continue;
    }

    if (stats.isDirectory()) {
      yield* visitDirectory(target, ctx);
      continue;
    }
    // Sockets, FIFOs and devices are not media.
    if (!stats.isFile()) continue;

    const filename = path.basename(target);
    const extension = extensionOf(filename);
    yield {
      path: target,
      filename,
      extension,
      fileType: ctx.classify(extension),
      size: stats.size,
      modifiedAt: Math.floor(stats.mtimeMs),
    };
  }
}

export async function* walk(rootPath: string, options: WalkOptions = {}): AsyncGenerator<DiscoveredFile> {
  const root = await resolveScanRoot(rootPath);
  const ctx: WalkContext = {
    visited: new Set(),
    classify: options.classify ?? defaultClassify,
    report: (entryPath, error) => {
      const mapped = toPathError(entryPath, error);
      options.onError?.({
        path: entryPath,
        code: errorCode(mapped),
        message: formatError(mapped),
      });
    },
  };

  yield* visitDirectory(root, ctx);
}
