import type { MediaMetadata } from '../interfaces/metadata.provider.js';
import { getMediaKind, getMediaMimeType } from '../../utils/mime-types.js';

/**
 * Metadata record with only the extension-derived fields filled in
 */
export function createEmptyMetadata(path: string): MediaMetadata {
  return {
    path,
    mimeType: getMediaMimeType(path),
    kind: getMediaKind(path),
    sizeBytes: null,
    width: null,
    height: null,
    durationSeconds: null,
    codec: null,
    make: null,
    model: null,
    createdAt: null,
    tags: {},
  };
}

/**
 * Read a finite number from a tool's loosely typed output
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toStringOrNull(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}
