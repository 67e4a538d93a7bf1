import { z } from 'zod';

import type { MetadataProvider, MediaMetadata } from '../interfaces/metadata.provider.js';
import { ExternalToolError } from '../../utils/errors.js';
import { runCommandOrThrow } from '../utils/spawn.js';
import { createEmptyMetadata, toNumber, toStringOrNull } from '../utils/media-metadata.js';

const exiftoolOutputSchema = z.array(z.record(z.unknown())).min(1);

/** Tags mapped onto dedicated fields, or not worth repeating */
const CONSUMED_TAGS = new Set([
  'SourceFile',
  'FileName',
  'Directory',
  'FileSize',
  'MIMEType',
  'ImageWidth',
  'ImageHeight',
  'Duration',
  'Make',
  'Model',
  'DateTimeOriginal',
  'CreateDate',
  'CompressorID',
  'VideoCodec',
  'AudioFormat',
  'ExifToolVersion',
]);

export interface ExiftoolOptions {
  exiftoolPath: string;
  timeoutMs: number;
}

/**
 * Map one exiftool JSON record (run with -n, so values are numeric where possible)
 */
export function mapExiftoolRecord(path: string, record: Record<string, unknown>): MediaMetadata {
  const metadata = createEmptyMetadata(path);
  const tags: Record<string, string | number> = {};

  for (const [key, value] of Object.entries(record)) {
    if (CONSUMED_TAGS.has(key)) continue;
    if (typeof value === 'string' || typeof value === 'number') {
      tags[key] = value;
    }
  }

  return {
    ...metadata,
    mimeType: toStringOrNull(record.MIMEType) ?? metadata.mimeType,
    sizeBytes: toNumber(record.FileSize),
    width: toNumber(record.ImageWidth),
    height: toNumber(record.ImageHeight),
    durationSeconds: toNumber(record.Duration),
    codec: toStringOrNull(record.CompressorID) ?? toStringOrNull(record.VideoCodec) ?? toStringOrNull(record.AudioFormat),
    make: toStringOrNull(record.Make),
    model: toStringOrNull(record.Model),
    createdAt: toStringOrNull(record.DateTimeOriginal) ?? toStringOrNull(record.CreateDate),
    tags,
  };
}

/**
 * Exiftool Metadata Provider
 *
 * Reads any file type exiftool understands; first in the metadata cascade.
 */
export class ExiftoolMetadataProvider implements MetadataProvider {
  readonly providerId = 'exiftool';

  constructor(private readonly options: ExiftoolOptions) {}

  supports(_path: string): boolean {
    return true;
  }

  async extract(path: string): Promise<MediaMetadata> {
    const result = await runCommandOrThrow(this.options.exiftoolPath, ['-j', '-n', path], {
      tool: 'exiftool',
      timeoutMs: this.options.timeoutMs,
    });

    let json: unknown;
    try {
      json = JSON.parse(result.stdout.toString());
    } catch {
      throw new ExternalToolError('exiftool', 'returned invalid JSON');
    }

    const parsed = exiftoolOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalToolError('exiftool', 'returned an unexpected document');
    }
    return mapExiftoolRecord(path, parsed.data[0]);
  }

  isAvailable(): boolean {
    return this.options.exiftoolPath.length > 0;
  }
}
