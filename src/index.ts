/**
 * Media indexer entry point.
 *
 * createMediaIndex() wires the pieces together:
 *   config → MetadataStore (SQLite) → scan store (walker → upsert)
 *                                   → gallery store (snapshot) → ThumbnailCache (sharp)
 * A finished scan refreshes the gallery (cancelled ones too: partial scans persist)
 * and is recorded as `lastScan` in the config file.
 */
import type { StoreApi } from 'zustand/vanilla';
import type { MediaIndexConfig } from './types';
import { formatError } from './lib/errors';
import { createLogger } from './lib/logger';
import { MetadataStore } from './lib/metadataStore';
import { ThumbnailCache, type ThumbnailDecoder } from './lib/thumbnailCache';
import { createConfigStore, lastScanFromSummary, type ConfigStore } from './stores/configStore';
import { createGalleryStore, type GalleryStore } from './stores/galleryStore';
import { createScanStore, type ScanStore } from './stores/scanStore';

const logger = createLogger('media-index');

export interface MediaIndexOptions {
  /** JSON config file; defaults to ./config.json. */
  configPath?: string;
  /** Use this config instead of reading the file. */
  config?: MediaIndexConfig;
  /** Replace the sharp decoder (e.g. in tests). */
  decode?: ThumbnailDecoder;
}

export interface MediaIndex {
  config: StoreApi<ConfigStore>;
  store: MetadataStore;
  thumbnails: ThumbnailCache;
  gallery: StoreApi<GalleryStore>;
  scan: StoreApi<ScanStore>;
  close: () => Promise<void>;
}

export async function createMediaIndex(options: MediaIndexOptions = {}): Promise<MediaIndex> {
  const config = createConfigStore(options.configPath, options.config);
  if (!options.config) {
    await config.getState().load();
  }
  const settings = config.getState().config;

  const store = MetadataStore.open(settings.databasePath);
  const thumbnails = new ThumbnailCache({
    maxSize: settings.thumbnailSize,
    concurrency: settings.thumbnailConcurrency,
    decode: options.decode,
  });
  const gallery = createGalleryStore({ store, thumbnails });
  const scan = createScanStore({
    store,
    classify: config.getState().classifier(),
    progressIntervalMs: settings.progressIntervalMs,
    ingestUnknown: settings.ingestUnknown,
  });

  let pendingWrite: Promise<void> = Promise.resolve();

  const unsubscribe = scan.getState().subscribe((event) => {
    if (event.type === 'progress' || event.type === 'started') return;

    if (event.type !== 'failed') {
      gallery.getState().refresh();
    }
    pendingWrite = pendingWrite
      .then(() => config.getState().setLastScan(lastScanFromSummary(event.summary)))
      .catch((error) => {
        logger.error('could not record last scan', { error: formatError(error) });
      });
  });

  gallery.getState().refresh();
  logger.info('ready', { databasePath: settings.databasePath, records: gallery.getState().rowCount() });

  return {
    config,
    store,
    thumbnails,
    gallery,
    scan,
    close: async () => {
      scan.getState().cancel();
      await scan.getState().waitForIdle();
      await pendingWrite;
      unsubscribe();
      gallery.getState().dispose();
      thumbnails.dispose();
      store.close();
    },
  };
}

export type {
  DecodedThumbnail,
  DiscoveredFile,
  FileType,
  ImageInfo,
  LastScanInfo,
  MediaIndexConfig,
  MediaKind,
  MediaRecord,
  MediaRecordInput,
  PlaceholderKind,
  PlaceholderThumbnail,
  ScanEvent,
  ScanListener,
  ScanStatus,
  ScanSummary,
  StorageStats,
  Thumbnail,
  ThumbnailEntry,
  WalkFailure,
} from './types';
export {
  classify,
  createClassifier,
  extensionOf,
  normalizeExtension,
  DEFAULT_IMAGE_EXTENSIONS,
  DEFAULT_VIDEO_EXTENSIONS,
  type Classifier,
} from './lib/classifier';
export { defaultConfig, loadConfig, mergeConfig, saveConfig } from './lib/config';
export { DecodeQueue } from './lib/decodeQueue';
export {
  AlreadyRunningError,
  DecodeFailureError,
  IndexOutOfRangeError,
  MediaIndexError,
  PathNotFoundError,
  PermissionDeniedError,
  formatError,
} from './lib/errors';
export { describeImage } from './lib/imageInfo';
export { createLogger, type Logger, type LogLevel } from './lib/logger';
export { MetadataStore } from './lib/metadataStore';
export { PLACEHOLDERS, ThumbnailCache, decodeWithSharp, type ThumbnailDecoder } from './lib/thumbnailCache';
export { resolveScanRoot, walk, type WalkOptions } from './lib/walker';
export { createConfigStore, type ConfigStore } from './stores/configStore';
export { createGalleryStore, type GalleryStore, type RowListener } from './stores/galleryStore';
export { createScanStore, isScanActive, type ScanSession, type ScanStore } from './stores/scanStore';
export { selectFileTypeCounts, selectRecordAt, selectRowCount, selectWindow } from './stores/selectors';
