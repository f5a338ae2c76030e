/**
 * image.ts
 *
 * Best-effort image type detection for multipart values sent without a filename.
 */

import sharp from 'sharp';

const IMAGE_FORMATS = new Set(['jpeg', 'png', 'gif', 'webp', 'tiff', 'avif', 'heif']);

/**
 * Probes the header of `data` and returns the image subtype (`png`, `jpeg`, ...)
 * or null when the bytes are not a supported raster image.
 */
export async function sniffImageType(data: Buffer): Promise<string | null> {
  if (data.length === 0) {
    return null;
  }
  let format: string | undefined;
  try {
    const metadata = await sharp(data).metadata();
    format = metadata.format;
  } catch {
    // unsupported or corrupt input: the value is not an image
    return null;
  }
  return format !== undefined && IMAGE_FORMATS.has(format) ? format : null;
}
