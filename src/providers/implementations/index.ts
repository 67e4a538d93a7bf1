/**
 * Provider Implementations
 */

export { SharpImageCodecProvider, sharpImageCodecProvider } from './sharp-image-codec.provider.js';
export { DcrawRawDecoderProvider, parseIdentifyOutput } from './dcraw-raw-decoder.provider.js';
export { FFmpegTranscoderProvider, buildFFmpegArgs } from './ffmpeg-transcoder.provider.js';
export { ExiftoolMetadataProvider } from './exiftool-metadata.provider.js';
export { FfprobeMetadataProvider } from './ffprobe-metadata.provider.js';
export { FileMetadataProvider } from './file-metadata.provider.js';
