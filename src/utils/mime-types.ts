/**
 * MIME Type Utilities
 *
 * Extension-based MIME detection shared by the metadata cascade and
 * the operations that need to recognise camera RAW input.
 */

export type MediaKind = 'raw' | 'image' | 'video' | 'audio' | 'other';

/**
 * Camera RAW MIME types mapped from file extensions
 */
const RAW_MIME_TYPES: Record<string, string> = {
  cr2: 'image/x-canon-cr2',
  cr3: 'image/x-canon-cr3',
  nef: 'image/x-nikon-nef',
  arw: 'image/x-sony-arw',
  dng: 'image/x-adobe-dng',
  raf: 'image/x-fuji-raf',
  orf: 'image/x-olympus-orf',
  rw2: 'image/x-panasonic-rw2',
  pef: 'image/x-pentax-pef',
  srw: 'image/x-samsung-srw',
  raw: 'image/x-panasonic-raw',
  crw: 'image/x-canon-crw',
  sr2: 'image/x-sony-sr2',
  srf: 'image/x-sony-srf',
  x3f: 'image/x-sigma-x3f',
  mrw: 'image/x-minolta-mrw',
  nrw: 'image/x-nikon-nrw',
  '3fr': 'image/x-hasselblad-3fr',
  kdc: 'image/x-kodak-kdc',
  erf: 'image/x-epson-erf',
};

const AUDIO_MIME_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  aac: 'audio/aac',
  m4a: 'audio/mp4',
  ogg: 'audio/ogg',
  flac: 'audio/flac',
  weba: 'audio/webm',
};

const VIDEO_MIME_TYPES: Record<string, string> = {
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  webm: 'video/webm',
  avi: 'video/x-msvideo',
  mkv: 'video/x-matroska',
  m4v: 'video/mp4',
};

const IMAGE_MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  avif: 'image/avif',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  heic: 'image/heic',
};

/**
 * Get file extension from path (lowercase, without dot)
 */
export function getExtension(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}

/**
 * Check whether a path names a camera RAW file
 */
export function isRawFile(filePath: string): boolean {
  return Object.hasOwn(RAW_MIME_TYPES, getExtension(filePath));
}

/**
 * Classify a file by its extension
 */
export function getMediaKind(filePath: string): MediaKind {
  const ext = getExtension(filePath);
  if (Object.hasOwn(RAW_MIME_TYPES, ext)) return 'raw';
  if (Object.hasOwn(IMAGE_MIME_TYPES, ext)) return 'image';
  if (Object.hasOwn(VIDEO_MIME_TYPES, ext)) return 'video';
  if (Object.hasOwn(AUDIO_MIME_TYPES, ext)) return 'audio';
  return 'other';
}

/**
 * Get MIME type for any supported media file
 * Checks RAW, image, video, then audio types
 */
export function getMediaMimeType(filePath: string, defaultType = 'application/octet-stream'): string {
  const ext = getExtension(filePath);
  for (const table of [RAW_MIME_TYPES, IMAGE_MIME_TYPES, VIDEO_MIME_TYPES, AUDIO_MIME_TYPES]) {
    if (Object.hasOwn(table, ext)) {
      return table[ext];
    }
  }
  return defaultType;
}

/**
 * RAW extensions this service recognises
 */
export function getRawExtensions(): string[] {
  return Object.keys(RAW_MIME_TYPES);
}
