/**
 * Image loading for report photos.
 *
 * Decoding is the one asynchronous step; it runs before the engine so that
 * scoreReport() can stay synchronous.
 */

import sharp from 'sharp';
import { ImageUnreadable } from './errors.js';
import type { DecodedImage } from './types.js';

/** Images are shrunk to fit this box before any pixel is inspected. */
export const ANALYSIS_SIZE = 64;

export function isReadableImage(image: DecodedImage | undefined): image is DecodedImage {
  if (!image) return false;
  const { width, height, channels, data } = image;
  return (
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width > 0 &&
    height > 0 &&
    (channels === 3 || channels === 4) &&
    data.length === width * height * channels
  );
}

export async function decodeImage(input: Buffer | string): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(input)
      .rotate()
      .resize(ANALYSIS_SIZE, ANALYSIS_SIZE, { fit: 'inside', withoutEnlargement: true })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      channels: info.channels,
      data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageUnreadable(`Failed to decode image: ${message}`, { cause: error });
  }
}
