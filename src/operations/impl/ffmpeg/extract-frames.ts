/**
 * video.extract_frames
 *
 * Sample frames from a video at a fixed rate and size for vision model input.
 * Frames are written as output_dir/frame_0001.jpg, frame_0002.jpg, ...
 * Frames left in output_dir by an earlier run are removed first.
 */

import { readdir } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { pathField, requireFile } from '../../utils/inputs.js';
import { ensureDir, safeUnlink } from '../../../utils/fs.js';

const FRAME_PATTERN = 'frame_%04d.jpg';
const FRAME_FILE = /^frame_\d{4,}\.jpg$/;

/** Frames reported when max_frames is not set */
export const DEFAULT_FRAME_LIMIT = 1000;

export interface FrameSampling {
  fps: number;
  width: number;
  height: number;
  maxFrames?: number;
}

/**
 * ffmpeg arguments between input and output
 */
export function buildFrameArgs(sampling: FrameSampling): string[] {
  return [
    '-vf', `fps=${sampling.fps},scale=${sampling.width}:${sampling.height}`,
    '-f', 'image2',
    ...(sampling.maxFrames === undefined ? [] : ['-frames:v', String(sampling.maxFrames)]),
  ];
}

export function frameFileName(index: number): string {
  return `frame_${String(index).padStart(4, '0')}.jpg`;
}

/**
 * Delete frame_NNNN.jpg files so a rerun never reports stale frames
 */
export async function clearFrames(outputDir: string): Promise<number> {
  const stale = (await readdir(outputDir)).filter((name) => FRAME_FILE.test(name));
  await Promise.all(stale.map((name) => safeUnlink(path.join(outputDir, name))));
  return stale.length;
}

/**
 * Frames ffmpeg wrote, in order, stopping at the first gap or at `limit`
 */
export async function collectFrames(outputDir: string, limit = DEFAULT_FRAME_LIMIT): Promise<string[]> {
  const names = new Set(await readdir(outputDir));
  const frames: string[] = [];
  for (let index = 1; index <= limit && names.has(frameFileName(index)); index++) {
    frames.push(path.join(outputDir, frameFileName(index)));
  }
  return frames;
}

const inputSchema = z.object({
  video_path: pathField('Path to the video file'),
  output_dir: pathField('Directory that receives the frames'),
  fps: z.number().positive().max(120).default(1).describe('Frames per second to sample'),
  width: z.number().int().min(1).max(8192).default(336).describe('Frame width'),
  height: z.number().int().min(1).max(8192).default(336).describe('Frame height'),
  max_frames: z.number().int().min(1).optional().describe('Stop after this many frames'),
});

const outputSchema = z.object({
  extracted: z.literal(true),
  frame_count: z.number().int(),
  frames: z.array(
    z.object({
      path: z.string(),
      index: z.number().int(),
      timestamp_ms: z.number().int(),
    })
  ),
});

export const extractFramesOperation = defineOperation({
  name: 'video.extract_frames',
  description: 'Extract frames from a video at a given rate and resolution for vision model input',
  tags: ['video', 'frames', 'extraction', 'vision'],
  examples: [
    {
      description: 'One 336x336 frame per second',
      input: { video_path: '/media/clip.mp4', output_dir: '/tmp/clip-frames' },
    },
    {
      description: 'First 16 frames at 2 fps, 224x224',
      input: { video_path: '/media/clip.mp4', output_dir: '/tmp/clip-frames', fps: 2, width: 224, height: 224, max_frames: 16 },
    },
  ],
  idempotent: true,
  sideEffects: ['replaces the frame_NNNN.jpg files in output_dir'],
  latencyTargetMs: 5000,
  inputSchema,
  outputSchema,

  async execute(input, ctx) {
    await requireFile(input.video_path, 'video_path');
    await ensureDir(input.output_dir);

    const removed = await clearFrames(input.output_dir);
    if (removed > 0) {
      ctx.logger.debug({ outputDir: input.output_dir, removed }, 'Removed frames from an earlier run');
    }

    await ctx.services.providers.get('transcoder').transcode({
      inputPath: input.video_path,
      outputPath: path.join(input.output_dir, FRAME_PATTERN),
      args: buildFrameArgs({
        fps: input.fps,
        width: input.width,
        height: input.height,
        maxFrames: input.max_frames,
      }),
    });

    const paths = await collectFrames(input.output_dir, input.max_frames ?? DEFAULT_FRAME_LIMIT);
    const frames = paths.map((framePath, index) => ({
      path: framePath,
      index,
      timestamp_ms: Math.round((index * 1000) / input.fps),
    }));

    ctx.logger.info({ videoPath: input.video_path, frameCount: frames.length }, 'Frames extracted');

    return { output: { extracted: true as const, frame_count: frames.length, frames } };
  },
});
