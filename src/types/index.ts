/**
 * Type definitions for the media indexer.
 *
 * Two layers of types:
 * 1. Row types (snake_case): match the columns of the `media_files` SQLite table.
 *    These are the raw shapes returned by better-sqlite3 statements.
 * 2. Domain types (camelCase): used by the stores, the walker and the thumbnail cache.
 *    Converted from rows in metadataStore.ts via rowToRecord().
 */

// -- Persisted row types (from SQLite) --

export interface MediaRow {
  id: number;
  path: string;
  filename: string;
  extension: string;
  file_type: string;
  size: number | null;
  modified_at: number | null;
  discovered_at: number;
}

// -- Domain types --

export type FileType = 'image' | 'video' | 'unknown';

export interface MediaRecord {
  path: string;          // absolute, symlink-resolved; identity key
  filename: string;
  extension: string;     // lower case with leading dot, '' when absent
  fileType: FileType;
  size: number | null;
  modifiedAt: number | null; // unix ms
  discoveredAt: number;      // unix ms of first successful upsert
}

/** Record as handed to the store; discoveredAt is stamped on insert when omitted. */
export type MediaRecordInput = Omit<MediaRecord, 'discoveredAt'> & { discoveredAt?: number };

/** Database footprint plus row counts, for a storage summary. */
export interface StorageStats {
  records: number;
  byType: Record<FileType, number>;
  /** Main file plus its WAL and shared-memory files; 0 for an in-memory store. */
  databaseBytes: number;
}

/** Header-level facts about an image, read without decoding its pixels. */
export interface ImageInfo {
  width: number;
  height: number;
  format: string;
  aspectRatio: number;
}

export interface DiscoveredFile {
  path: string;
  filename: string;
  extension: string;
  fileType: FileType;
  size: number;
  modifiedAt: number;
}

export interface WalkFailure {
  path: string;
  code: string;
  message: string;
}

// -- Scan session --

export type ScanStatus = 'idle' | 'running' | 'cancelling' | 'completed' | 'cancelled' | 'failed';

export type FinishedScanStatus = Extract<ScanStatus, 'completed' | 'cancelled' | 'failed'>;

export interface ScanSummary {
  rootPath: string;
  status: FinishedScanStatus;
  processed: number;
  inserted: number;
  skipped: number;
  failures: number;
  startedAt: number;
  finishedAt: number;
  error: string | null;
}

export type ScanEvent =
  | { type: 'started'; rootPath: string }
  | { type: 'progress'; path: string; processed: number; inserted: number; skipped: number }
  | { type: 'completed'; summary: ScanSummary }
  | { type: 'cancelled'; summary: ScanSummary }
  | { type: 'failed'; rootPath: string; reason: string; summary: ScanSummary };

export type ScanListener = (event: ScanEvent) => void;

// -- Thumbnails --

export interface DecodedThumbnail {
  kind: 'image';
  width: number;
  height: number;
  format: 'jpeg';
  data: Buffer;
}

export type PlaceholderKind = 'pending' | 'failed' | 'video' | 'file';

export interface PlaceholderThumbnail {
  kind: 'placeholder';
  placeholder: PlaceholderKind;
}

export type Thumbnail = DecodedThumbnail | PlaceholderThumbnail;

export type ThumbnailEntry =
  | { status: 'pending' }
  | { status: 'ready'; image: DecodedThumbnail }
  | { status: 'failed'; reason: string };

// -- Configuration --

export type MediaKind = Exclude<FileType, 'unknown'>;

export interface LastScanInfo {
  timestamp: string;     // ISO 8601
  status: FinishedScanStatus;
  rootPath: string;
  newFiles: number;
  totalFiles: number;
}

export interface MediaIndexConfig {
  databasePath: string;
  imageExtensions: string[];
  videoExtensions: string[];
  thumbnailSize: number;
  thumbnailConcurrency: number;
  progressIntervalMs: number;
  ingestUnknown: boolean;
  lastScan: LastScanInfo | null;
}
