import type { MediaKind } from '../../utils/mime-types.js';

/**
 * Universal media metadata; fields a source does not report stay null
 */
export interface MediaMetadata {
  path: string;
  mimeType: string;
  kind: MediaKind;
  sizeBytes: number | null;
  width: number | null;
  height: number | null;
  durationSeconds: number | null;
  codec: string | null;
  make: string | null;
  model: string | null;
  createdAt: string | null;
  /** Remaining tags as reported by the source */
  tags: Record<string, string | number>;
}

/**
 * MetadataProvider Interface
 *
 * Implementations: ExiftoolMetadataProvider, FfprobeMetadataProvider, FileMetadataProvider
 *
 * Providers are tried in registration order; the first that returns metadata wins.
 */
export interface MetadataProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Whether this provider can read the given file type
   */
  supports(path: string): boolean;

  extract(path: string): Promise<MediaMetadata>;

  isAvailable(): boolean;
}
