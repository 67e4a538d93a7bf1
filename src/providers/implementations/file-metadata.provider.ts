import { stat } from 'fs/promises';
import sharp from 'sharp';

import type { MetadataProvider, MediaMetadata } from '../interfaces/metadata.provider.js';
import { createEmptyMetadata } from '../utils/media-metadata.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * File Metadata Provider
 *
 * Last resort of the metadata cascade: file size and modification time,
 * plus dimensions for ordinary images sharp can read.
 */
export class FileMetadataProvider implements MetadataProvider {
  readonly providerId = 'file';

  supports(_path: string): boolean {
    return true;
  }

  async extract(path: string): Promise<MediaMetadata> {
    const stats = await stat(path);
    const metadata: MediaMetadata = {
      ...createEmptyMetadata(path),
      sizeBytes: stats.size,
      createdAt: stats.mtime.toISOString(),
    };

    if (metadata.kind !== 'image') {
      return metadata;
    }

    try {
      const info = await sharp(path).metadata();
      return {
        ...metadata,
        width: info.width ?? null,
        height: info.height ?? null,
        codec: info.format ?? null,
      };
    } catch (error) {
      // Size and date are still worth returning for an unreadable image
      return { ...metadata, tags: { decode_error: getErrorMessage(error) } };
    }
  }

  isAvailable(): boolean {
    return true;
  }
}
