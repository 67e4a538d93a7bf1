/**
 * audio.preprocess / audio.extract
 *
 * Resample and re-encode audio with ffmpeg. audio.extract takes the audio
 * track of a video file (-vn).
 */

import { z } from 'zod';

import { defineOperation, type OperationContext } from '../../types.js';
import { pathField, requireFile } from '../../utils/inputs.js';
import { ensureParentDir } from '../../../utils/fs.js';

export const AUDIO_FORMATS = ['wav', 'mp3', 'flac'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export interface AudioSettings {
  sampleRate: number;
  channels: number;
  format: AudioFormat;
  /** Drop any video stream */
  dropVideo: boolean;
}

/**
 * ffmpeg arguments between input and output
 */
export function buildAudioArgs(settings: AudioSettings): string[] {
  return [
    ...(settings.dropVideo ? ['-vn'] : []),
    '-ar', String(settings.sampleRate),
    '-ac', String(settings.channels),
    '-f', settings.format,
  ];
}

const audioOptionsShape = {
  output_path: pathField('Path of the processed audio file'),
  sample_rate: z.number().int().min(8000).max(192000).default(48000).describe('Target sample rate in Hz'),
  channels: z.number().int().min(1).max(8).default(1).describe('Number of output channels'),
  format: z.enum(AUDIO_FORMATS).default('wav').describe('Output container/codec'),
};

const outputSchema = z.object({
  processed: z.literal(true),
  output_path: z.string(),
  sample_rate: z.number().int(),
  channels: z.number().int(),
  format: z.enum(AUDIO_FORMATS),
});

interface AudioJob {
  inputPath: string;
  inputField: string;
  outputPath: string;
  settings: AudioSettings;
}

async function runAudioJob(job: AudioJob, ctx: OperationContext) {
  await requireFile(job.inputPath, job.inputField);
  await ensureParentDir(job.outputPath);

  await ctx.services.providers.get('transcoder').transcode({
    inputPath: job.inputPath,
    outputPath: job.outputPath,
    args: buildAudioArgs(job.settings),
  });

  return {
    output: {
      processed: true as const,
      output_path: job.outputPath,
      sample_rate: job.settings.sampleRate,
      channels: job.settings.channels,
      format: job.settings.format,
    },
  };
}

export const audioPreprocessOperation = defineOperation({
  name: 'audio.preprocess',
  description: 'Resample and convert an audio file (sample rate, channel count, format) via ffmpeg',
  tags: ['audio', 'preprocessing', 'conversion'],
  examples: [
    {
      description: '48 kHz mono WAV',
      input: { input_path: '/media/voice.m4a', output_path: '/tmp/voice.wav' },
    },
    {
      description: '16 kHz mono FLAC for speech models',
      input: { input_path: '/media/voice.mp3', output_path: '/tmp/voice.flac', sample_rate: 16000, format: 'flac' },
    },
  ],
  idempotent: true,
  sideEffects: ['writes output_path'],
  latencyTargetMs: 2000,
  inputSchema: z.object({ input_path: pathField('Path to the input audio file'), ...audioOptionsShape }),
  outputSchema,

  execute(input, ctx) {
    return runAudioJob(
      {
        inputPath: input.input_path,
        inputField: 'input_path',
        outputPath: input.output_path,
        settings: { sampleRate: input.sample_rate, channels: input.channels, format: input.format, dropVideo: false },
      },
      ctx
    );
  },
});

export const audioExtractOperation = defineOperation({
  name: 'audio.extract',
  description: 'Extract and convert the audio track of a video file via ffmpeg',
  tags: ['audio', 'video', 'extraction'],
  examples: [
    {
      description: 'Soundtrack as 48 kHz mono WAV',
      input: { video_path: '/media/clip.mp4', output_path: '/tmp/clip.wav' },
    },
  ],
  idempotent: true,
  sideEffects: ['writes output_path'],
  latencyTargetMs: 2000,
  inputSchema: z.object({ video_path: pathField('Path to the input video file'), ...audioOptionsShape }),
  outputSchema,

  execute(input, ctx) {
    return runAudioJob(
      {
        inputPath: input.video_path,
        inputField: 'video_path',
        outputPath: input.output_path,
        settings: { sampleRate: input.sample_rate, channels: input.channels, format: input.format, dropVideo: true },
      },
      ctx
    );
  },
});
