/**
 * raw.metadata
 *
 * Camera metadata from a RAW file, read by the decoder without decoding pixels.
 * GPS and white balance come from the metadata cascade (exiftool) when the
 * decoder does not report them.
 */

import { z } from 'zod';

import { defineOperation, type OperationContext } from '../../types.js';
import { pathField, requireRawFile } from '../../utils/inputs.js';
import type { GpsCoordinates, RawMetadata } from '../../../types/media.types.js';
import { getErrorMessage } from '../../../utils/errors.js';

/** EXIF WhiteBalance values as exiftool reports them with -n */
const WHITE_BALANCE_NAMES: Record<number, string> = { 0: 'Auto', 1: 'Manual' };

type ExifExtras = Pick<RawMetadata, 'gps' | 'whiteBalance'>;

const NO_EXTRAS: ExifExtras = { gps: null, whiteBalance: null };

/**
 * Pick GPS and white balance out of exiftool tags
 */
export function exifExtras(tags: Record<string, string | number>): ExifExtras {
  const { GPSLatitude: latitude, GPSLongitude: longitude, GPSAltitude: altitude, WhiteBalance: wb } = tags;

  let gps: GpsCoordinates | null = null;
  if (typeof latitude === 'number' && typeof longitude === 'number') {
    gps = { latitude, longitude, altitude: typeof altitude === 'number' ? altitude : null };
  }

  let whiteBalance: string | null = null;
  if (typeof wb === 'number') {
    whiteBalance = WHITE_BALANCE_NAMES[wb] ?? String(wb);
  } else if (typeof wb === 'string' && wb.length > 0) {
    whiteBalance = wb;
  }

  return { gps, whiteBalance };
}

async function readExifExtras(ctx: OperationContext, path: string): Promise<ExifExtras> {
  try {
    const { metadata } = await ctx.services.metadata.extract(path);
    return exifExtras(metadata.tags);
  } catch (error) {
    ctx.logger.warn({ path, error: getErrorMessage(error) }, 'No EXIF reader for GPS and white balance');
    return NO_EXTRAS;
  }
}

const inputSchema = z.object({
  input_path: pathField('Path to the RAW file'),
});

const outputSchema = z.object({
  make: z.string().nullable(),
  model: z.string().nullable(),
  lens: z.string().nullable(),
  iso: z.number().nullable(),
  aperture: z.number().nullable(),
  shutter_speed: z.string().nullable(),
  focal_length: z.number().nullable(),
  width: z.number().int().nullable(),
  height: z.number().int().nullable(),
  timestamp: z.string().nullable().describe('Capture time, ISO 8601 when it parses'),
  gps: z
    .object({ latitude: z.number(), longitude: z.number(), altitude: z.number().nullable() })
    .nullable(),
  white_balance: z.string().nullable(),
  extra: z.record(z.string()),
});

export const rawMetadataOperation = defineOperation({
  name: 'raw.metadata',
  description: 'Read camera make, model, exposure settings, dimensions and location from a RAW file',
  tags: ['raw', 'metadata', 'exif'],
  examples: [{ description: 'Canon CR2', input: { input_path: '/photos/IMG_0001.CR2' } }],
  idempotent: true,
  sideEffects: [],
  latencyTargetMs: 100,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    await requireRawFile(input.input_path, 'input_path');

    const meta = await ctx.services.providers.get('rawDecoder').readMetadata(input.input_path);
    const extras =
      meta.gps && meta.whiteBalance
        ? NO_EXTRAS
        : await readExifExtras(ctx, input.input_path);

    return {
      output: {
        make: meta.make,
        model: meta.model,
        lens: meta.lens,
        iso: meta.iso,
        aperture: meta.aperture,
        shutter_speed: meta.shutterSpeed,
        focal_length: meta.focalLength,
        width: meta.width,
        height: meta.height,
        timestamp: meta.timestamp,
        gps: meta.gps ?? extras.gps,
        white_balance: meta.whiteBalance ?? extras.whiteBalance,
        extra: meta.extra,
      },
    };
  },
});
