import path from 'node:path';
import type { FileType } from '../types';

export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg', '.jpeg', '.png', '.bmp', '.gif', '.webp', '.tiff', '.tif',
  '.svg', '.heic', '.ico', '.raw', '.cr2', '.nef', '.orf', '.sr2',
];

export const DEFAULT_VIDEO_EXTENSIONS: readonly string[] = [
  '.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv',
  '.mpg', '.mpeg', '.m4v', '.3gp', '.webm', '.ts', '.mts', '.m2ts',
];

export type Classifier = (extension: string) => FileType;

export interface ExtensionSets {
  imageExtensions: readonly string[];
  videoExtensions: readonly string[];
}

/** `JPG`, `.JPG` and `.jpg` all become `.jpg`; blank input becomes ''. */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function extensionOf(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function createClassifier(sets: ExtensionSets): Classifier {
  const images = new Set(sets.imageExtensions.map(normalizeExtension));
  const videos = new Set(sets.videoExtensions.map(normalizeExtension));

  return (extension: string): FileType => {
    const ext = normalizeExtension(extension);
    if (!ext) return 'unknown';
    // An extension listed in both sets is treated as an image.
    if (images.has(ext)) return 'image';
    if (videos.has(ext)) return 'video';
    return 'unknown';
  };
}

export const classify: Classifier = createClassifier({
  imageExtensions: DEFAULT_IMAGE_EXTENSIONS,
  videoExtensions: DEFAULT_VIDEO_EXTENSIONS,
});
