import sharp from 'sharp';
import { EncodeError } from './errors';
import { ImageDecoderService } from './image-decoder.service';

export const PREVIEW_SIZE = 256;

export class PreviewService {
  constructor(private readonly decoder: ImageDecoderService = new ImageDecoderService()) {}

  /**
   * First frame scaled to fit inside a square box, as PNG.
   * Unlike emotes nothing is cropped, and small images are not enlarged.
   */
  async render(filePath: string, box: number = PREVIEW_SIZE): Promise<Buffer> {
    const source = await this.decoder.decodeFile(filePath);

    try {
      return await sharp(source.data, {
        raw: { width: source.width, height: source.height, channels: source.channels },
      })
        .resize(box, box, { fit: 'inside', withoutEnlargement: true })
        .png()
        .toBuffer();
    } catch (error) {
      throw new EncodeError('preview', error);
    }
  }
}
