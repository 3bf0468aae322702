import { createStore, type StoreApi } from 'zustand/vanilla';
import type { LastScanInfo, MediaIndexConfig, MediaKind, ScanSummary } from '../types';
import { createClassifier, normalizeExtension, type Classifier } from '../lib/classifier';
import { defaultConfig, loadConfig, resolveConfigPath, saveConfig } from '../lib/config';

export interface ConfigStore {
  configPath: string;
  config: MediaIndexConfig;
  isLoaded: boolean;
  load: () => Promise<MediaIndexConfig>;
  addExtension: (kind: MediaKind, extension: string) => Promise<boolean>;
  removeExtension: (kind: MediaKind, extension: string) => Promise<boolean>;
  setLastScan: (info: LastScanInfo) => Promise<void>;
  classifier: () => Classifier;
}

function extensionsOf(config: MediaIndexConfig, kind: MediaKind): string[] {
  return kind === 'image' ? config.imageExtensions : config.videoExtensions;
}

function withExtensions(config: MediaIndexConfig, kind: MediaKind, list: string[]): MediaIndexConfig {
  return kind === 'image' ? { ...config, imageExtensions: list } : { ...config, videoExtensions: list };
}

export function lastScanFromSummary(summary: ScanSummary): LastScanInfo {
  return {
    timestamp: new Date(summary.finishedAt).toISOString(),
    status: summary.status,
    rootPath: summary.rootPath,
    newFiles: summary.inserted,
    totalFiles: summary.processed,
  };
}

export function createConfigStore(configPath?: string, initial?: MediaIndexConfig): StoreApi<ConfigStore> {
  return createStore<ConfigStore>((set, get) => {
    const persist = async (config: MediaIndexConfig) => {
      set({ config });
      await saveConfig(get().configPath, config);
    };

    return {
      configPath: resolveConfigPath(configPath),
      config: initial ?? defaultConfig(),
      isLoaded: initial !== undefined,

      load: async () => {
        const config = await loadConfig(get().configPath);
        set({ config, isLoaded: true });
        return config;
      },

      addExtension: async (kind, extension) => {
        const ext = normalizeExtension(extension);
        const { config } = get();
        const current = extensionsOf(config, kind);
        if (!ext || current.includes(ext)) {
          return false;
        }
        await persist(withExtensions(config, kind, [...current, ext]));
        return true;
      },

      removeExtension: async (kind, extension) => {
        const ext = normalizeExtension(extension);
        const { config } = get();
        const current = extensionsOf(config, kind);
        if (!current.includes(ext)) {
          return false;
        }
        await persist(withExtensions(config, kind, current.filter((item) => item !== ext)));
        return true;
      },

      setLastScan: async (info) => {
        await persist({ ...get().config, lastScan: info });
      },

      classifier: () => {
        const { imageExtensions, videoExtensions } = get().config;
        return createClassifier({ imageExtensions, videoExtensions });
      },
    };
  });
}
