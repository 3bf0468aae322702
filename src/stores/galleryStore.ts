/**
 * Gallery data provider: a windowed, index-addressable view over the MetadataStore.
 *
 * Architecture: zustand vanilla store holding one immutable snapshot.
 * - `records` is a frozen array of frozen records; `indexByPath` maps path → row.
 * - refresh() builds the next snapshot off to the side and swaps it in with a
 *   single set(), so a reader sees either the old rows or the new ones, never a mix.
 * - A virtualized view asks only for the rows it shows: rowAt(i) is O(1) and
 *   thumbnailFor(i) delegates to the ThumbnailCache, which returns at once.
 * - When a thumbnail lands, row listeners get the row index to repaint.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { MediaRecord, Thumbnail } from '../types';
import { IndexOutOfRangeError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { MetadataStore } from '../lib/metadataStore';
import type { ThumbnailCache } from '../lib/thumbnailCache';
import { selectRecordAt, selectRowCount } from './selectors';

const logger = createLogger('gallery');

export type RowListener = (index: number) => void;

export interface GallerySnapshot {
  records: readonly MediaRecord[];
  indexByPath: ReadonlyMap<string, number>;
  folder: string | null;
  version: number;
}

export interface GalleryStore extends GallerySnapshot {
  rowCount: () => number;
  rowAt: (index: number) => MediaRecord;
  thumbnailFor: (index: number) => Thumbnail;
  refresh: () => void;
  setFolder: (folder: string | null) => void;
  folders: () => string[];
  subscribeRows: (listener: RowListener) => () => void;
  dispose: () => void;
}

export interface GalleryStoreDeps {
  store: MetadataStore;
  thumbnails: ThumbnailCache;
}

export function buildSnapshot(
  records: readonly MediaRecord[],
  folder: string | null,
  version: number,
): GallerySnapshot {
  const frozen = Object.freeze(records.map((record) => Object.freeze({ ...record })));
  const indexByPath = new Map<string, number>();
  frozen.forEach((record, index) => indexByPath.set(record.path, index));
  return { records: frozen, indexByPath, folder, version };
}

export function createGalleryStore(deps: GalleryStoreDeps): StoreApi<GalleryStore> {
  const rowListeners = new Set<RowListener>();

  const gallery = createStore<GalleryStore>((set, get) => ({
    ...buildSnapshot([], null, 0),

    rowCount: () => selectRowCount(get()),

    rowAt: (index: number) => {
      const state = get();
      const record = selectRecordAt(state, index);
      if (!record) {
        throw new IndexOutOfRangeError(index, selectRowCount(state));
      }
      return record;
    },

    thumbnailFor: (index: number) => {
      const record = get().rowAt(index);
      return deps.thumbnails.get(record.path, record.fileType);
    },

    refresh: () => {
      const { folder, version } = get();
      const records = folder === null ? deps.store.loadAll() : deps.store.loadUnder(folder);
      set(buildSnapshot(records, folder, version + 1));
      logger.debug('refreshed', { folder, rows: records.length });
    },

    setFolder: (folder: string | null) => {
      if (get().folder === folder) return;
      set({ folder });
      get().refresh();
    },

    folders: () => deps.store.listFolders(),

    subscribeRows: (listener: RowListener) => {
      rowListeners.add(listener);
      return () => {
        rowListeners.delete(listener);
      };
    },

    dispose: () => {
      stopThumbnailUpdates();
      rowListeners.clear();
    },
  }));

  const stopThumbnailUpdates = deps.thumbnails.onReady((path) => {
    const index = gallery.getState().indexByPath.get(path);
    if (index === undefined) return;
    for (const listener of rowListeners) {
      listener(index);
    }
  });

  return gallery;
}
