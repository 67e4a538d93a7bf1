import type { DecodedImage, PreviewFormat } from '../../types/media.types.js';

/**
 * Encode options
 */
export interface EncodeOptions {
  format: PreviewFormat;
  /** Quality 1-100 (ignored by lossless png) */
  quality: number;
}

/**
 * Encoded image bytes plus what was written
 */
export interface EncodedImage {
  buffer: Buffer;
  width: number;
  height: number;
  format: PreviewFormat;
}

/**
 * ImageCodecProvider Interface
 *
 * Implementations: SharpImageCodecProvider
 *
 * Converts between encoded files/buffers and decoded rasters.
 */
export interface ImageCodecProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Decode an encoded image (file path or buffer), applying EXIF orientation
   */
  decode(input: string | Buffer): Promise<DecodedImage>;

  /**
   * Encode a raster
   */
  encode(image: DecodedImage, options: EncodeOptions): Promise<EncodedImage>;

  isAvailable(): boolean;
}
