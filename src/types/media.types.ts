/**
 * Media domain types shared across providers, services and operations
 */

/**
 * Interleaved 8-bit pixel layouts, keyed by channel count
 */
export type PixelFormat = 'gray8' | 'graya8' | 'rgb8' | 'rgba8';

export type ChannelCount = 1 | 2 | 3 | 4;

/**
 * Decoded raster: interleaved 8-bit pixels, row-major, no padding
 */
export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: ChannelCount;
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Execution backends, in preference order
 */
export const BACKENDS = ['cuda', 'metal', 'compute', 'cpu'] as const;

export type Backend = (typeof BACKENDS)[number];

/**
 * RAW extraction tiers, in ascending cost
 */
export type ExtractionTierName = 'EmbeddedPreview' | 'FastDecode' | 'FullDecode';

export interface ExtractionTier {
  name: ExtractionTierName;
  cost: 1 | 2 | 3;
  quality: 'embedded' | 'reduced' | 'full';
}

export const EXTRACTION_TIERS: readonly ExtractionTier[] = [
  { name: 'EmbeddedPreview', cost: 1, quality: 'embedded' },
  { name: 'FastDecode', cost: 2, quality: 'reduced' },
  { name: 'FullDecode', cost: 3, quality: 'full' },
];

/**
 * Encoded output formats for previews
 */
export const PREVIEW_FORMATS = ['webp', 'jpeg', 'png', 'avif'] as const;

export type PreviewFormat = (typeof PREVIEW_FORMATS)[number];

/**
 * Camera metadata read from a RAW file
 */
export interface GpsCoordinates {
  latitude: number;
  longitude: number;
  altitude: number | null;
}

export interface RawMetadata {
  make: string | null;
  model: string | null;
  lens: string | null;
  iso: number | null;
  aperture: number | null;
  shutterSpeed: string | null;
  focalLength: number | null;
  width: number | null;
  height: number | null;
  /** ISO 8601 when the camera clock parses, otherwise as reported */
  timestamp: string | null;
  gps: GpsCoordinates | null;
  /** White balance as set in camera */
  whiteBalance: string | null;
  extra: Record<string, string>;
}

/**
 * Map a channel count to its pixel format
 */
export function pixelFormatOf(image: Pick<DecodedImage, 'channels'>): PixelFormat {
  switch (image.channels) {
    case 1:
      return 'gray8';
    case 2:
      return 'graya8';
    case 3:
      return 'rgb8';
    case 4:
      return 'rgba8';
  }
}

/**
 * Narrow an arbitrary channel count reported by a codec
 */
export function toChannelCount(channels: number): ChannelCount {
  if (channels === 1 || channels === 2 || channels === 3 || channels === 4) {
    return channels;
  }
  throw new Error(`Unsupported channel count: ${channels}`);
}
