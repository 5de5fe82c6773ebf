/**
 * Media Storage
 *
 * Stores uploaded recipe images on the local filesystem under MEDIA_ROOT and
 * exposes them under MEDIA_URL. Paths handed back to callers are relative to
 * the media root (e.g. `uploads/recipe/<uuid>.png`).
 */

import { randomUUID } from 'crypto';
import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import sharp from 'sharp';
import { InvalidImageError } from '../errors.js';

const RECIPE_IMAGE_DIR = 'uploads/recipe';

// sharp format -> file extension
const IMAGE_EXTENSIONS: Record<string, string> = {
  jpeg: 'jpg',
  png: 'png',
  webp: 'webp',
  gif: 'gif',
  tiff: 'tiff',
  heif: 'heif',
};

function extensionFor(metadata: sharp.Metadata): string | undefined {
  const { format } = metadata;
  if (!format) return undefined;
  // sharp reports AVIF as a HEIF container with AV1 compression
  if (format === 'heif' && metadata.compression === 'av1') return 'avif';
  return IMAGE_EXTENSIONS[format];
}

export interface InspectedImage {
  buffer: Buffer;
  format: string;
  extension: string;
}

export class LocalMediaStorage {
  constructor(
    private readonly root: string,
    private readonly baseUrl: string,
  ) {}

  /**
   * Decode the whole image and reject anything that is not a complete,
   * supported raster image.
   */
  async inspectImage(buffer: Buffer): Promise<InspectedImage> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(buffer).metadata();
      await sharp(buffer, { failOn: 'truncated' }).stats();
    } catch {
      throw new InvalidImageError();
    }

    const extension = extensionFor(metadata);
    if (!metadata.format || !extension) {
      throw new InvalidImageError();
    }
    return { buffer, format: metadata.format, extension };
  }

  async saveRecipeImage(image: InspectedImage): Promise<string> {
    const relativePath = `${RECIPE_IMAGE_DIR}/${randomUUID()}.${image.extension}`;
    const filePath = this.resolve(relativePath);

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, image.buffer);
    console.log(`[Media] Stored ${relativePath} (${image.buffer.length} bytes)`);

    return relativePath;
  }

  async remove(relativePath: string): Promise<void> {
    await rm(this.resolve(relativePath), { force: true });
    console.log(`[Media] Removed ${relativePath}`);
  }

  url(relativePath: string): string {
    return `${this.baseUrl}${relativePath}`;
  }

  resolve(relativePath: string): string {
    return join(this.root, relativePath);
  }
}
