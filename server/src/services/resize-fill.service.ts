import sharp from 'sharp';
import { TransformError } from './errors';
import { SourceImage } from './image-decoder.service';

export interface FillGeometry {
  /** Uniform factor that makes the source cover the target */
  scale: number;
  scaledWidth: number;
  scaledHeight: number;
  /** Offset of the centred crop window inside the scaled image */
  left: number;
  top: number;
}

/**
 * Geometry of a cover-then-centre-crop resize
 */
export function computeFillGeometry(
  sourceWidth: number,
  sourceHeight: number,
  targetWidth: number,
  targetHeight: number
): FillGeometry {
  const scale = Math.max(targetWidth / sourceWidth, targetHeight / sourceHeight);
  const scaledWidth = Math.max(targetWidth, Math.round(sourceWidth * scale));
  const scaledHeight = Math.max(targetHeight, Math.round(sourceHeight * scale));

  return {
    scale,
    scaledWidth,
    scaledHeight,
    left: Math.floor((scaledWidth - targetWidth) / 2),
    top: Math.floor((scaledHeight - targetHeight) / 2),
  };
}

export class ResizeFillService {
  /**
   * Scale the source to cover width x height, then crop at the offsets
   * computeFillGeometry gives (odd overhangs round towards the top-left).
   * Lanczos3 resampling; sharp premultiplies alpha while filtering.
   */
  async resizeFill(source: SourceImage, width: number, height: number): Promise<SourceImage> {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new TransformError(`invalid target size ${width}x${height}`);
    }

    const geometry = computeFillGeometry(source.width, source.height, width, height);

    try {
      const { data, info } = await sharp(source.data, {
        raw: { width: source.width, height: source.height, channels: source.channels },
      })
        .resize(geometry.scaledWidth, geometry.scaledHeight, {
          fit: 'fill',
          kernel: sharp.kernel.lanczos3,
        })
        .extract({ left: geometry.left, top: geometry.top, width, height })
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.width !== width || info.height !== height || info.channels !== 4) {
        throw new Error(
          `resampler returned ${info.width}x${info.height}x${info.channels}`
        );
      }

      return { width, height, channels: 4, data };
    } catch (error) {
      throw new TransformError(`failed to resize to ${width}x${height}`, error);
    }
  }
}
