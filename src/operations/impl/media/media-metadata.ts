/**
 * media.metadata
 *
 * Universal metadata for any media file through the reader cascade.
 */

import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { pathField, requireFile } from '../../utils/inputs.js';

const inputSchema = z.object({
  input_path: pathField('Path to an image, RAW, audio or video file'),
});

const outputSchema = z.object({
  path: z.string(),
  mime_type: z.string(),
  kind: z.enum(['raw', 'image', 'video', 'audio', 'other']),
  size_bytes: z.number().int().nullable(),
  width: z.number().int().nullable(),
  height: z.number().int().nullable(),
  duration_seconds: z.number().nullable(),
  codec: z.string().nullable(),
  make: z.string().nullable(),
  model: z.string().nullable(),
  created_at: z.string().nullable(),
  tags: z.record(z.union([z.string(), z.number()])),
  backend: z.string().describe('Reader that produced the metadata'),
});

export const mediaMetadataOperation = defineOperation({
  name: 'media.metadata',
  description: 'Read metadata from any media file, trying exiftool, then ffprobe, then plain file info',
  tags: ['metadata', 'exif', 'image', 'audio', 'video'],
  examples: [
    { description: 'Video container', input: { input_path: '/media/clip.mp4' } },
    { description: 'JPEG with EXIF', input: { input_path: '/media/photo.jpg' } },
  ],
  idempotent: true,
  sideEffects: [],
  latencyTargetMs: 200,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    await requireFile(input.input_path, 'input_path');

    const { metadata, backend } = await ctx.services.metadata.extract(input.input_path);

    return {
      output: {
        path: metadata.path,
        mime_type: metadata.mimeType,
        kind: metadata.kind,
        size_bytes: metadata.sizeBytes,
        width: metadata.width,
        height: metadata.height,
        duration_seconds: metadata.durationSeconds,
        codec: metadata.codec,
        make: metadata.make,
        model: metadata.model,
        created_at: metadata.createdAt,
        tags: metadata.tags,
        backend,
      },
    };
  },
});
