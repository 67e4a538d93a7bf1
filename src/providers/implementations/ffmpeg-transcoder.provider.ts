import type { TranscoderProvider, TranscodeRequest, TranscodeResult } from '../interfaces/transcoder.provider.js';
import { createChildLogger } from '../../utils/logger.js';
import { startStopwatch } from '../../utils/timer.js';
import { runCommandOrThrow } from '../utils/spawn.js';

const logger = createChildLogger({ service: 'ffmpeg' });

export interface FFmpegOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

/**
 * Build the full ffmpeg argument list for a request
 */
export function buildFFmpegArgs(request: TranscodeRequest): string[] {
  return ['-y', '-hide_banner', '-i', request.inputPath, ...request.args, request.outputPath];
}

/**
 * FFmpeg Transcoder Provider
 *
 * Runs `ffmpeg -y -hide_banner -i <input> <args...> <output>`.
 */
export class FFmpegTranscoderProvider implements TranscoderProvider {
  readonly providerId = 'ffmpeg';

  constructor(private readonly options: FFmpegOptions) {}

  async transcode(request: TranscodeRequest): Promise<TranscodeResult> {
    const args = buildFFmpegArgs(request);
    const elapsed = startStopwatch();

    logger.info({ input: request.inputPath, output: request.outputPath }, 'Running ffmpeg');
    await runCommandOrThrow(this.options.ffmpegPath, args, {
      tool: 'ffmpeg',
      timeoutMs: this.options.timeoutMs,
    });

    const durationMs = elapsed();
    logger.debug({ output: request.outputPath, durationMs }, 'ffmpeg finished');
    return { outputPath: request.outputPath, durationMs };
  }

  isAvailable(): boolean {
    return this.options.ffmpegPath.length > 0;
  }
}
