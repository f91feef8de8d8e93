import { CatalogError } from '../services/errors';
import {
  DEFAULT_EMOTE_SIZES,
  EmoteSize,
  SizeCatalog,
  emoteFileSuffix,
} from '../services/size-catalog.service';

describe('SizeCatalog', () => {
  describe('default catalog', () => {
    it('should contain the 11 baseline sizes in order', () => {
      const catalog = new SizeCatalog();

      expect(catalog.size).toBe(11);
      expect(catalog.entries.map(emoteFileSuffix)).toEqual([
        'Discord-Small-28x28',
        'Discord-Medium-32x32',
        'Discord-Large-48x48',
        'Discord-Animated-128x128',
        'Twitch-1.0-28x28',
        'Twitch-2.0-56x56',
        'Twitch-3.0-112x112',
        '7TV-1x-32x32',
        '7TV-2x-64x64',
        '7TV-3x-96x96',
        '7TV-4x-128x128',
      ]);
    });

    it('should list platforms in first-seen order', () => {
      expect(new SizeCatalog().platforms()).toEqual(['Discord', 'Twitch', '7TV']);
    });

    it('should be frozen', () => {
      const catalog = new SizeCatalog();

      expect(Object.isFrozen(catalog.entries)).toBe(true);
      expect(Object.isFrozen(catalog.entries[0])).toBe(true);
      expect(Object.isFrozen(DEFAULT_EMOTE_SIZES)).toBe(true);
    });
  });

  describe('custom catalogs', () => {
    it('should copy the input so later edits do not leak in', () => {
      const sizes: EmoteSize[] = [{ platform: 'Test', variant: 'A', width: 8, height: 8 }];
      const catalog = new SizeCatalog(sizes);

      sizes.push({ platform: 'Test', variant: 'B', width: 16, height: 16 });

      expect(catalog.size).toBe(1);
    });

    it('should allow non-square sizes', () => {
      const catalog = new SizeCatalog([{ platform: 'Banner', variant: 'Wide', width: 64, height: 16 }]);

      expect(catalog.entries[0]).toEqual({ platform: 'Banner', variant: 'Wide', width: 64, height: 16 });
    });

    it('should reject an empty table', () => {
      expect(() => new SizeCatalog([])).toThrow(CatalogError);
    });

    it('should reject non-positive or fractional dimensions', () => {
      expect(() => new SizeCatalog([{ platform: 'T', variant: 'A', width: 0, height: 8 }]))
        .toThrow('invalid dimensions for T A: 0x8');
      expect(() => new SizeCatalog([{ platform: 'T', variant: 'A', width: 8, height: 7.5 }]))
        .toThrow(CatalogError);
    });

    it('should reject duplicate platform/variant pairs', () => {
      expect(() => new SizeCatalog([
        { platform: 'T', variant: 'A', width: 8, height: 8 },
        { platform: 'T', variant: 'A', width: 16, height: 16 },
      ])).toThrow('duplicate catalog entry: T A');
    });

    it('should reject entries whose output names collide', () => {
      expect(() => new SizeCatalog([
        { platform: 'a-b', variant: 'c', width: 8, height: 8 },
        { platform: 'a', variant: 'b-c', width: 8, height: 8 },
      ])).toThrow('catalog entries collide on output name: a-b-c-8x8');
    });
  });
});
