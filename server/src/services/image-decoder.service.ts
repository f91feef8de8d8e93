import { readFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { DecodeError, IOError } from './errors';

/**
 * Decoded raster: tightly packed RGBA rows, never mutated after creation
 */
export interface SourceImage {
  readonly width: number;
  readonly height: number;
  readonly channels: 4;
  readonly data: Buffer;
}

export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'webp';

export const SUPPORTED_FORMATS: readonly ImageFormat[] = ['jpeg', 'png', 'gif', 'webp'];

/**
 * Lowercase extension of a path without the dot ('' when there is none)
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Map an extension to its image format, or null when it names none
 */
export function formatForExtension(extension: string): ImageFormat | null {
  const ext = extension.toLowerCase().replace(/^\./, '');
  if (ext === 'jpg') return 'jpeg';
  return isSupportedFormat(ext) ? ext : null;
}

/**
 * Formats whose extension selects a dedicated decoder. A .webp hint is
 * sniffed like an unknown extension.
 */
const PINNED_FORMATS: readonly ImageFormat[] = ['jpeg', 'png', 'gif'];

function isSupportedFormat(value: string | undefined): value is ImageFormat {
  return SUPPORTED_FORMATS.some((format) => format === value);
}

export class ImageDecoderService {
  /**
   * Read a file from disk and decode its first frame
   */
  async decodeFile(filePath: string): Promise<SourceImage> {
    let bytes: Buffer;
    try {
      bytes = await readFile(filePath);
    } catch (error) {
      throw new IOError(`failed to open file: ${filePath}`, filePath, error);
    }

    return this.decodeBuffer(bytes, extensionOf(filePath));
  }

  /**
   * Decode raw bytes. A jpeg/png/gif hint pins the decoder; anything else is sniffed.
   */
  async decodeBuffer(bytes: Buffer, extensionHint: string): Promise<SourceImage> {
    const format = formatForExtension(extensionHint);
    const hinted = format !== null && PINNED_FORMATS.includes(format) ? format : null;
    const attempted = hinted ?? 'auto';

    let detected: string | undefined;
    try {
      const metadata = await sharp(bytes).metadata();
      detected = metadata.format;
    } catch (error) {
      throw new DecodeError(attempted, `failed to decode image (${attempted})`, error);
    }

    if (hinted !== null && detected !== hinted) {
      throw new DecodeError(
        hinted,
        `failed to decode image: expected ${hinted} data but found ${detected ?? 'unknown'}`
      );
    }
    if (!isSupportedFormat(detected)) {
      throw new DecodeError(
        attempted,
        `failed to decode image: unsupported format ${detected ?? 'unknown'}`
      );
    }

    try {
      // Only the first page of an animated gif/webp is read
      const { data, info } = await sharp(bytes, { pages: 1, page: 0 })
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 4) {
        throw new Error(`expected 4 channels, got ${info.channels}`);
      }

      return { width: info.width, height: info.height, channels: 4, data };
    } catch (error) {
      throw new DecodeError(detected, `failed to decode image (${detected})`, error);
    }
  }
}
