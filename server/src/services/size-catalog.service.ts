import { CatalogError } from './errors';

export interface EmoteSize {
  readonly platform: string;
  readonly variant: string;
  readonly width: number;
  readonly height: number;
}

/**
 * Baseline emote sizes, in output order
 */
export const DEFAULT_EMOTE_SIZES: readonly EmoteSize[] = Object.freeze([
  // Discord
  { platform: 'Discord', variant: 'Small', width: 28, height: 28 },
  { platform: 'Discord', variant: 'Medium', width: 32, height: 32 },
  { platform: 'Discord', variant: 'Large', width: 48, height: 48 },
  { platform: 'Discord', variant: 'Animated', width: 128, height: 128 },

  // Twitch
  { platform: 'Twitch', variant: '1.0', width: 28, height: 28 },
  { platform: 'Twitch', variant: '2.0', width: 56, height: 56 },
  { platform: 'Twitch', variant: '3.0', width: 112, height: 112 },

  // 7TV
  { platform: '7TV', variant: '1x', width: 32, height: 32 },
  { platform: '7TV', variant: '2x', width: 64, height: 64 },
  { platform: '7TV', variant: '3x', width: 96, height: 96 },
  { platform: '7TV', variant: '4x', width: 128, height: 128 },
].map((size) => Object.freeze(size)));

/**
 * Immutable, ordered set of sizes a conversion produces.
 * Built once and handed to the converter so tests can inject a smaller table.
 */
export class SizeCatalog {
  readonly entries: readonly EmoteSize[];

  constructor(sizes: readonly EmoteSize[] = DEFAULT_EMOTE_SIZES) {
    if (sizes.length === 0) {
      throw new CatalogError('catalog must contain at least one size');
    }

    const keys = new Set<string>();
    const suffixes = new Set<string>();
    for (const size of sizes) {
      if (!isPositiveInteger(size.width) || !isPositiveInteger(size.height)) {
        throw new CatalogError(
          `invalid dimensions for ${size.platform} ${size.variant}: ${size.width}x${size.height}`
        );
      }

      const key = `${size.platform}\u0000${size.variant}`;
      if (keys.has(key)) {
        throw new CatalogError(`duplicate catalog entry: ${size.platform} ${size.variant}`);
      }
      keys.add(key);

      // Output names join fields with '-', so distinct entries can still collide
      const suffix = emoteFileSuffix(size);
      if (suffixes.has(suffix)) {
        throw new CatalogError(`catalog entries collide on output name: ${suffix}`);
      }
      suffixes.add(suffix);
    }

    this.entries = Object.freeze(sizes.map((size) => Object.freeze({ ...size })));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Distinct platforms in first-seen order
   */
  platforms(): string[] {
    return [...new Set(this.entries.map((entry) => entry.platform))];
  }
}

/**
 * Part of an output file name that follows the bundle base name
 */
export function emoteFileSuffix(size: EmoteSize): string {
  return `${size.platform}-${size.variant}-${size.width}x${size.height}`;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
