/**
 * raw.preview
 *
 * Encoded preview of a camera RAW file through the extraction tiers.
 * Without output_path the bytes come back base64-encoded in the reply.
 */

import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { pathField, requireRawFile } from '../../utils/inputs.js';
import { BACKENDS, PREVIEW_FORMATS } from '../../../types/media.types.js';
import type { AppConfig } from '../../../config/index.js';
import type { PreviewOptions, PreviewResult } from '../../../services/preview-pipeline.service.js';

/**
 * Encoding options shared with raw.batch_preview
 */
export const previewOptionsShape = {
  quality: z.number().int().min(1).max(100).optional().describe('Encoder quality 1-100 (default: 92)'),
  max_dimension: z
    .number()
    .int()
    .min(1)
    .nullable()
    .optional()
    .describe('Longest output side in pixels, null keeps the source size (default: 2048)'),
  force_highest_tier: z.boolean().default(false).describe('Skip the embedded preview and fast decode'),
  format: z.enum(PREVIEW_FORMATS).default('webp').describe('Output format'),
};

const previewOptionsSchema = z.object(previewOptionsShape);

export type PreviewOptionsInput = z.output<typeof previewOptionsSchema>;

/**
 * Resolve request options against the configured defaults
 */
export function toPreviewOptions(input: PreviewOptionsInput, config: AppConfig): PreviewOptions {
  return {
    quality: input.quality ?? config.preview.quality,
    maxDimension: input.max_dimension === undefined ? config.preview.maxDimension : input.max_dimension,
    forceHighestTier: input.force_highest_tier,
    format: input.format,
  };
}

export const tierAttemptSchema = z.object({
  tier: z.string(),
  status: z.enum(['success', 'declined', 'failed']),
  reason: z.string().optional(),
});

const inputSchema = z.object({
  input_path: pathField('Path to the RAW file'),
  output_path: pathField('Write the preview here instead of returning it inline').optional(),
  ...previewOptionsShape,
});

const outputSchema = z.object({
  source_tier: z.enum(['EmbeddedPreview', 'FastDecode', 'FullDecode']),
  width: z.number().int(),
  height: z.number().int(),
  format: z.enum(PREVIEW_FORMATS),
  quality: z.number().int(),
  bytes: z.number().int(),
  output_path: z.string().optional(),
  data_base64: z.string().optional(),
  backend: z.enum(BACKENDS),
  backend_used: z.enum(BACKENDS),
  resize_fell_back: z.boolean(),
  tiers_attempted: z.array(tierAttemptSchema),
  timings_ms: z.record(z.number()),
});

export type RawPreviewOutput = z.input<typeof outputSchema>;

/**
 * Reply fields for a generated preview
 */
export function toPreviewOutput(result: PreviewResult): RawPreviewOutput {
  return {
    source_tier: result.sourceTier.name,
    width: result.width,
    height: result.height,
    format: result.format,
    quality: result.quality,
    bytes: result.buffer.length,
    ...(result.outputPath ? { output_path: result.outputPath } : { data_base64: result.buffer.toString('base64') }),
    backend: result.backend,
    backend_used: result.backendUsed,
    resize_fell_back: result.fellBack,
    tiers_attempted: result.attempts.map((a) => ({
      tier: a.name,
      status: a.status,
      ...(a.reason === undefined ? {} : { reason: a.reason }),
    })),
    timings_ms: result.timings,
  };
}

export const rawPreviewOperation = defineOperation({
  name: 'raw.preview',
  description:
    'Extract a preview from a camera RAW file: embedded preview, then half-size decode, then full decode; ' +
    'resize on the active backend and encode',
  tags: ['raw', 'image', 'preview', 'decode'],
  examples: [
    {
      description: 'Inline WebP preview, longest side 2048',
      input: { input_path: '/photos/IMG_0001.CR2' },
    },
    {
      description: 'Full-quality JPEG written to disk',
      input: {
        input_path: '/photos/DSC_0420.NEF',
        output_path: '/previews/DSC_0420.jpg',
        format: 'jpeg',
        max_dimension: null,
        force_highest_tier: true,
      },
    },
  ],
  idempotent: true,
  sideEffects: ['writes output_path when given'],
  latencyTargetMs: 500,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    await requireRawFile(input.input_path, 'input_path');

    const result = await ctx.services.previews.generate(input.input_path, {
      ...toPreviewOptions(input, ctx.services.config),
      outputPath: input.output_path,
    });

    return { output: toPreviewOutput(result), cost: result.sourceTier.cost };
  },
});
