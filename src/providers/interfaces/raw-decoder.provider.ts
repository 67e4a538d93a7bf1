import type { DecodedImage, RawMetadata } from '../../types/media.types.js';

/**
 * RawDecoderProvider Interface
 *
 * Implementations: DcrawRawDecoderProvider
 *
 * Wraps a camera RAW decoder. Every method decodes to interleaved 8-bit
 * pixels with the camera orientation already applied.
 */
export interface RawDecoderProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Extract the camera-embedded preview, or null when the file carries none
   */
  tryEmbeddedPreview(path: string): Promise<DecodedImage | null>;

  /**
   * Decode at reduced (half) resolution
   */
  decodeReduced(path: string): Promise<DecodedImage>;

  /**
   * Decode at full sensor resolution
   */
  decodeFull(path: string): Promise<DecodedImage>;

  /**
   * Read camera metadata without decoding pixels
   */
  readMetadata(path: string): Promise<RawMetadata>;

  /**
   * Check if provider is available (decoder binary configured)
   */
  isAvailable(): boolean;
}
