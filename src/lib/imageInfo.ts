/**
 * On-demand image details for a metadata panel: resolution, format, aspect ratio.
 * sharp reads only the header, so this is cheap even for large files.
 */
import sharp from 'sharp';
import type { ImageInfo } from '../types';
import { DecodeFailureError } from './errors';

export async function describeImage(path: string): Promise<ImageInfo> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(path).metadata();
  } catch (error) {
    throw new DecodeFailureError(path, { cause: error });
  }

  const { width, height, format } = metadata;
  if (!width || !height || !format) {
    throw new DecodeFailureError(path, { cause: 'missing dimensions or format' });
  }
  return {
    width,
    height,
    format,
    aspectRatio: Math.round((width / height) * 100) / 100,
  };
}
