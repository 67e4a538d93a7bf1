import { describe, it, expect, beforeAll } from 'vitest';
import sharp from 'sharp';
import { SharpImageCodecProvider } from './sharp-image-codec.provider.js';
import type { DecodedImage } from '../../types/media.types.js';

describe('SharpImageCodecProvider', () => {
  let provider: SharpImageCodecProvider;
  let rgbImage: DecodedImage;
  let rgbaImage: DecodedImage;

  beforeAll(async () => {
    provider = new SharpImageCodecProvider();

    const rgb = await sharp({
      create: { width: 60, height: 40, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .raw()
      .toBuffer({ resolveWithObject: true });
    rgbImage = { data: rgb.data, width: 60, height: 40, channels: 3 };

    const rgba = await sharp({
      create: { width: 20, height: 10, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 0.5 } },
    })
      .raw()
      .toBuffer({ resolveWithObject: true });
    rgbaImage = { data: rgba.data, width: 20, height: 10, channels: 4 };
  });

  it('should have correct provider ID', () => {
    expect(provider.providerId).toBe('sharp');
    expect(provider.isAvailable()).toBe(true);
  });

  describe('encode', () => {
    it.each(['webp', 'jpeg', 'png', 'avif'] as const)('should encode %s with the source dimensions', async (format) => {
      const encoded = await provider.encode(rgbImage, { format, quality: 80 });

      expect(encoded.format).toBe(format);
      expect(encoded.width).toBe(60);
      expect(encoded.height).toBe(40);

      const meta = await sharp(encoded.buffer).metadata();
      expect(meta.width).toBe(60);
      expect(meta.height).toBe(40);
    });

    it('should write the requested container', async () => {
      const webp = await provider.encode(rgbImage, { format: 'webp', quality: 92 });
      const jpeg = await provider.encode(rgbImage, { format: 'jpeg', quality: 92 });

      expect((await sharp(webp.buffer).metadata()).format).toBe('webp');
      expect((await sharp(jpeg.buffer).metadata()).format).toBe('jpeg');
    });

    it('should drop alpha for jpeg', async () => {
      const encoded = await provider.encode(rgbaImage, { format: 'jpeg', quality: 90 });
      const meta = await sharp(encoded.buffer).metadata();

      expect(meta.channels).toBe(3);
      expect(meta.hasAlpha).toBe(false);
    });

    it('should keep alpha for png', async () => {
      const encoded = await provider.encode(rgbaImage, { format: 'png', quality: 90 });
      const meta = await sharp(encoded.buffer).metadata();

      expect(meta.hasAlpha).toBe(true);
    });

    it('should produce smaller output at lower quality', async () => {
      const noisy = Buffer.alloc(64 * 64 * 3);
      for (let i = 0; i < noisy.length; i++) {
        noisy[i] = (i * 7919) % 256;
      }
      const image: DecodedImage = { data: noisy, width: 64, height: 64, channels: 3 };

      const low = await provider.encode(image, { format: 'jpeg', quality: 10 });
      const high = await provider.encode(image, { format: 'jpeg', quality: 100 });

      expect(low.buffer.length).toBeLessThan(high.buffer.length);
    });
  });

  describe('decode', () => {
    it('should decode an encoded buffer to raw pixels', async () => {
      const png = await sharp({
        create: { width: 12, height: 8, channels: 3, background: { r: 10, g: 20, b: 30 } },
      })
        .png()
        .toBuffer();

      const decoded = await provider.decode(png);

      expect(decoded.width).toBe(12);
      expect(decoded.height).toBe(8);
      expect(decoded.channels).toBe(3);
      expect(decoded.data.length).toBe(12 * 8 * 3);
      expect([...decoded.data.subarray(0, 3)]).toEqual([10, 20, 30]);
    });

    it('should apply EXIF orientation', async () => {
      // Orientation 6 = rotate 90° clockwise for display
      const jpeg = await sharp({
        create: { width: 30, height: 10, channels: 3, background: { r: 0, g: 128, b: 0 } },
      })
        .jpeg()
        .withMetadata({ orientation: 6 })
        .toBuffer();

      const decoded = await provider.decode(jpeg);

      expect(decoded.width).toBe(10);
      expect(decoded.height).toBe(30);
    });

    it('should reject data that is not an image', async () => {
      await expect(provider.decode(Buffer.from('not an image'))).rejects.toThrow();
    });
  });
});
