/**
 * Configuration file handling.
 *
 * The config is a JSON file (default `./config.json`). Missing keys fall back to
 * defaults, a missing or unreadable file means "all defaults", and fields with the
 * wrong shape are ignored one by one rather than rejecting the whole file.
 * MEDIA_INDEX_DB overrides the database path.
 */
import path from 'node:path';
import fse from 'fs-extra';
import type { FinishedScanStatus, LastScanInfo, MediaIndexConfig } from '../types';
import { DEFAULT_IMAGE_EXTENSIONS, DEFAULT_VIDEO_EXTENSIONS, normalizeExtension } from './classifier';
import { formatError } from './errors';
import { createLogger } from './logger';
import { DEFAULT_THUMBNAIL_SIZE } from './thumbnailCache';

const logger = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'config.json';

export function defaultConfig(): MediaIndexConfig {
  return {
    databasePath: 'media.db',
    imageExtensions: [...DEFAULT_IMAGE_EXTENSIONS],
    videoExtensions: [...DEFAULT_VIDEO_EXTENSIONS],
    thumbnailSize: DEFAULT_THUMBNAIL_SIZE,
    thumbnailConcurrency: 2,
    progressIntervalMs: 100,
    ingestUnknown: true,
    lastScan: null,
  };
}

export function resolveConfigPath(configPath?: string): string {
  return path.resolve(configPath ?? DEFAULT_CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readExtensionList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const list: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') continue;
    const ext = normalizeExtension(item);
    if (ext && !list.includes(ext)) list.push(ext);
  }
  return list;
}

function readPositiveInt(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 1) return null;
  return Math.floor(value);
}

function readNonNegativeInt(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return null;
  return Math.floor(value);
}

function isFinishedStatus(value: unknown): value is FinishedScanStatus {
  return value === 'completed' || value === 'cancelled' || value === 'failed';
}

function readLastScan(value: unknown): LastScanInfo | null {
  if (!isRecord(value)) return null;
  const { timestamp, status, rootPath, newFiles, totalFiles } = value;
  if (typeof timestamp !== 'string' || !isFinishedStatus(status) || typeof rootPath !== 'string') {
    return null;
  }
  return {
    timestamp,
    status,
    rootPath,
    newFiles: readNonNegativeInt(newFiles) ?? 0,
    totalFiles: readNonNegativeInt(totalFiles) ?? 0,
  };
}

/** Merge a parsed JSON value over the defaults, keeping only well-formed fields. */
export function mergeConfig(raw: unknown, base: MediaIndexConfig = defaultConfig()): MediaIndexConfig {
  if (!isRecord(raw)) return base;
  return {
    databasePath:
      typeof raw.databasePath === 'string' && raw.databasePath.trim()
        ? raw.databasePath
        : base.databasePath,
    imageExtensions: readExtensionList(raw.imageExtensions) ?? base.imageExtensions,
    videoExtensions: readExtensionList(raw.videoExtensions) ?? base.videoExtensions,
    thumbnailSize: readPositiveInt(raw.thumbnailSize) ?? base.thumbnailSize,
    thumbnailConcurrency: readPositiveInt(raw.thumbnailConcurrency) ?? base.thumbnailConcurrency,
    progressIntervalMs: readNonNegativeInt(raw.progressIntervalMs) ?? base.progressIntervalMs,
    ingestUnknown: typeof raw.ingestUnknown === 'boolean' ? raw.ingestUnknown : base.ingestUnknown,
    lastScan: 'lastScan' in raw ? readLastScan(raw.lastScan) : base.lastScan,
  };
}

function applyEnv(config: MediaIndexConfig, env: NodeJS.ProcessEnv): MediaIndexConfig {
  const databasePath = (env.MEDIA_INDEX_DB || '').trim();
  return databasePath ? { ...config, databasePath } : config;
}

export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<MediaIndexConfig> {
  const file = resolveConfigPath(configPath);
  let raw: unknown = null;
  if (await fse.pathExists(file)) {
    try {
      raw = await fse.readJson(file);
    } catch (error) {
      logger.warn('unreadable config, using defaults', { file, error: formatError(error) });
    }
  }
  return applyEnv(mergeConfig(raw), env);
}

export async function saveConfig(configPath: string, config: MediaIndexConfig): Promise<void> {
  const file = resolveConfigPath(configPath);
  await fse.outputJson(file, config, { spaces: 4 });
}
