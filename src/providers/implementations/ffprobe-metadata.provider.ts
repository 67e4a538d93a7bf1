import { z } from 'zod';

import type { MetadataProvider, MediaMetadata } from '../interfaces/metadata.provider.js';
import { ExternalToolError } from '../../utils/errors.js';
import { getMediaKind } from '../../utils/mime-types.js';
import { runCommandOrThrow } from '../utils/spawn.js';
import { createEmptyMetadata, toNumber, toStringOrNull } from '../utils/media-metadata.js';

const streamSchema = z.object({
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  r_frame_rate: z.string().optional(),
  sample_rate: z.string().optional(),
  channels: z.number().optional(),
});

export const ffprobeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: z
    .object({
      format_name: z.string().optional(),
      duration: z.string().optional(),
      size: z.string().optional(),
      bit_rate: z.string().optional(),
      tags: z.record(z.string()).optional(),
    })
    .optional(),
});

export type FfprobeOutput = z.infer<typeof ffprobeOutputSchema>;

export interface FfprobeOptions {
  ffprobePath: string;
  timeoutMs: number;
}

/**
 * Parse a frame rate that can be "30/1" or "29.97"
 */
export function parseFrameRate(value: string): number | null {
  const [num, den] = value.split('/');
  const rate = den ? parseFloat(num) / parseFloat(den) : parseFloat(num);
  return Number.isFinite(rate) ? rate : null;
}

export function mapFfprobeOutput(path: string, output: FfprobeOutput): MediaMetadata {
  const metadata = createEmptyMetadata(path);
  const video = output.streams.find((s) => s.codec_type === 'video');
  const audio = output.streams.find((s) => s.codec_type === 'audio');
  const tags: Record<string, string | number> = { ...(output.format?.tags ?? {}) };
  delete tags.creation_time;

  if (output.format?.format_name) tags.format_name = output.format.format_name;
  if (output.format?.bit_rate) tags.bit_rate = Number(output.format.bit_rate);
  if (video?.r_frame_rate) {
    const fps = parseFrameRate(video.r_frame_rate);
    if (fps !== null) tags.fps = fps;
  }
  if (audio?.sample_rate) tags.sample_rate = Number(audio.sample_rate);
  if (audio?.channels !== undefined) tags.channels = audio.channels;

  return {
    ...metadata,
    sizeBytes: toNumber(output.format?.size),
    width: video?.width ?? null,
    height: video?.height ?? null,
    durationSeconds: toNumber(output.format?.duration),
    codec: video?.codec_name ?? audio?.codec_name ?? null,
    createdAt: toStringOrNull(output.format?.tags?.creation_time),
    tags,
  };
}

/**
 * FFprobe Metadata Provider
 *
 * Reads audio and video containers.
 */
export class FfprobeMetadataProvider implements MetadataProvider {
  readonly providerId = 'ffprobe';

  constructor(private readonly options: FfprobeOptions) {}

  supports(path: string): boolean {
    const kind = getMediaKind(path);
    return kind === 'video' || kind === 'audio';
  }

  async extract(path: string): Promise<MediaMetadata> {
    const args = ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', path];
    const result = await runCommandOrThrow(this.options.ffprobePath, args, {
      tool: 'ffprobe',
      timeoutMs: this.options.timeoutMs,
    });

    let json: unknown;
    try {
      json = JSON.parse(result.stdout.toString());
    } catch {
      throw new ExternalToolError('ffprobe', 'returned invalid JSON');
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalToolError('ffprobe', 'returned an unexpected document');
    }
    return mapFfprobeOutput(path, parsed.data);
  }

  isAvailable(): boolean {
    return this.options.ffprobePath.length > 0;
  }
}
