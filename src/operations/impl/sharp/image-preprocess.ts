/**
 * image.preprocess
 *
 * Resize an image to exact dimensions and re-encode it for vision model input.
 * Camera RAW inputs are decoded through the extraction tiers first.
 */

import { writeFile } from 'fs/promises';
import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { pathField, requireFile } from '../../utils/inputs.js';
import { extractWithTiers } from '../../../services/extraction-tiers.js';
import { ensureParentDir } from '../../../utils/fs.js';
import { isRawFile } from '../../../utils/mime-types.js';
import { BACKENDS, type DecodedImage, type PreviewFormat } from '../../../types/media.types.js';

export const IMAGE_OUTPUT_FORMATS = ['jpg', 'jpeg', 'png', 'webp', 'avif'] as const;

export type ImageOutputFormat = (typeof IMAGE_OUTPUT_FORMATS)[number];

export function toCodecFormat(format: ImageOutputFormat): PreviewFormat {
  return format === 'jpg' ? 'jpeg' : format;
}

const inputSchema = z.object({
  input_path: pathField('Path to the input image (JPEG, PNG, WebP, AVIF, TIFF or camera RAW)'),
  output_path: pathField('Path of the processed image'),
  width: z.number().int().min(1).max(16384).default(336).describe('Target width'),
  height: z.number().int().min(1).max(16384).default(336).describe('Target height'),
  format: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(IMAGE_OUTPUT_FORMATS))
    .default('jpg')
    .describe('Output format'),
  quality: z.number().int().min(1).max(100).default(90).describe('Quality for lossy formats'),
});

const outputSchema = z.object({
  processed: z.literal(true),
  output_path: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  format: z.enum(IMAGE_OUTPUT_FORMATS),
  quality: z.number().int(),
  source_tier: z.string().optional().describe('Extraction tier, for RAW inputs'),
  backend_used: z.enum(BACKENDS),
});

export const imagePreprocessOperation = defineOperation({
  name: 'image.preprocess',
  description:
    'Resize and convert an image to exact dimensions and a given format for vision model input ' +
    '(JPEG, PNG, WebP, AVIF, camera RAW)',
  tags: ['image', 'preprocessing', 'resize', 'conversion'],
  examples: [
    {
      description: '336x336 JPEG for a CLIP-style model',
      input: { input_path: '/media/photo.png', output_path: '/tmp/photo.jpg' },
    },
    {
      description: 'RAW to 512x512 WebP',
      input: { input_path: '/photos/IMG_0001.CR2', output_path: '/tmp/img.webp', width: 512, height: 512, format: 'webp' },
    },
  ],
  idempotent: true,
  sideEffects: ['writes output_path'],
  latencyTargetMs: 300,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    const { providers, selector, transform } = ctx.services;
    await requireFile(input.input_path, 'input_path');

    let source: DecodedImage;
    let sourceTier: string | undefined;
    if (isRawFile(input.input_path)) {
      const extraction = await extractWithTiers(providers.get('rawDecoder'), input.input_path);
      source = extraction.image;
      sourceTier = extraction.sourceTier.name;
    } else {
      source = await providers.get('imageCodec').decode(input.input_path);
    }

    const { backend } = await selector.select();
    const resized = await transform.resize(source, input.width, input.height, backend);
    const encoded = await providers
      .get('imageCodec')
      .encode(resized.image, { format: toCodecFormat(input.format), quality: input.quality });

    await ensureParentDir(input.output_path);
    await writeFile(input.output_path, encoded.buffer);

    return {
      output: {
        processed: true as const,
        output_path: input.output_path,
        width: encoded.width,
        height: encoded.height,
        format: input.format,
        quality: input.quality,
        ...(sourceTier === undefined ? {} : { source_tier: sourceTier }),
        backend_used: resized.backendUsed,
      },
    };
  },
});
