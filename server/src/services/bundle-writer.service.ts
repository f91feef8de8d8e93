import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { EncodeError, WriteError } from './errors';
import { SourceImage } from './image-decoder.service';
import { EmoteSize, emoteFileSuffix } from './size-catalog.service';

export const BUNDLE_SUFFIX = '_emote_bundle';

/**
 * File name without directory or extension
 */
export function bundleBaseName(inputPath: string): string {
  return path.basename(inputPath, path.extname(inputPath));
}

/**
 * Sibling directory that receives every emote generated from inputPath
 */
export function bundleDirectoryFor(inputPath: string): string {
  return path.join(path.dirname(inputPath), bundleBaseName(inputPath) + BUNDLE_SUFFIX);
}

export function emoteFileName(baseName: string, size: EmoteSize): string {
  return `${baseName}-${emoteFileSuffix(size)}.png`;
}

/**
 * Writes PNG emotes into one bundle directory.
 * Existing files with the same name are overwritten; nothing is ever removed.
 */
export class BundleWriter {
  readonly directory: string;
  readonly baseName: string;
  private directoryReady: Promise<void> | null = null;

  constructor(inputPath: string) {
    this.directory = bundleDirectoryFor(inputPath);
    this.baseName = bundleBaseName(inputPath);
  }

  /**
   * Create the bundle directory once; concurrent callers share the same attempt
   */
  ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          throw new WriteError(
            path.basename(this.directory),
            this.directory,
            error
          );
        }
      );
    }
    return this.directoryReady;
  }

  /**
   * Encode one raster as PNG and save it. Returns the written path.
   */
  async write(size: EmoteSize, raster: SourceImage): Promise<string> {
    const filename = emoteFileName(this.baseName, size);
    const outputPath = path.join(this.directory, filename);

    await this.ensureDirectory();

    let png: Buffer;
    try {
      png = await sharp(raster.data, {
        raw: { width: raster.width, height: raster.height, channels: raster.channels },
      })
        .png()
        .toBuffer();
    } catch (error) {
      throw new EncodeError(filename, error);
    }

    try {
      await writeFile(outputPath, png);
    } catch (error) {
      throw new WriteError(filename, outputPath, error);
    }

    return outputPath;
  }
}
