import sharp from 'sharp';

import type { ImageCodecProvider, EncodeOptions, EncodedImage } from '../interfaces/image-codec.provider.js';
import { toChannelCount, type DecodedImage } from '../../types/media.types.js';

/**
 * Sharp Image Codec Provider
 *
 * Uses Sharp (libvips) to decode files to raw rasters and encode rasters
 * to webp, jpeg, png or avif.
 */
export class SharpImageCodecProvider implements ImageCodecProvider {
  readonly providerId = 'sharp';

  async decode(input: string | Buffer): Promise<DecodedImage> {
    const { data, info } = await sharp(input)
      .rotate() // apply EXIF orientation
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      channels: toChannelCount(info.channels),
    };
  }

  async encode(image: DecodedImage, options: EncodeOptions): Promise<EncodedImage> {
    const { format, quality } = options;
    let pipeline = sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    });

    switch (format) {
      case 'webp':
        pipeline = pipeline.webp({ quality });
        break;
      case 'jpeg': {
        // JPEG has no alpha channel
        const hasAlpha = image.channels === 2 || image.channels === 4;
        pipeline = (hasAlpha ? pipeline.flatten({ background: '#ffffff' }) : pipeline).jpeg({ quality });
        break;
      }
      case 'png':
        pipeline = pipeline.png();
        break;
      case 'avif':
        pipeline = pipeline.avif({ quality });
        break;
    }

    const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
    return { buffer: data, width: info.width, height: info.height, format };
  }

  isAvailable(): boolean {
    return true;
  }
}

export const sharpImageCodecProvider = new SharpImageCodecProvider();
