/**
 * Provider Setup
 *
 * Builds the provider registry from configuration.
 * Metadata providers are registered in cascade order: exiftool, ffprobe, file.
 */

import type { AppConfig } from '../config/index.js';
import { ProviderRegistry } from './provider-registry.js';
import {
  sharpImageCodecProvider,
  DcrawRawDecoderProvider,
  FFmpegTranscoderProvider,
  ExiftoolMetadataProvider,
  FfprobeMetadataProvider,
  FileMetadataProvider,
} from './implementations/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'provider-setup' });

/**
 * Register all default providers
 */
export function setupDefaultProviders(config: AppConfig, registry = new ProviderRegistry()): ProviderRegistry {
  const { tools } = config;

  registry.register('imageCodec', sharpImageCodecProvider, true);
  registry.register(
    'rawDecoder',
    new DcrawRawDecoderProvider(sharpImageCodecProvider, { dcrawPath: tools.dcrawPath, timeoutMs: tools.timeoutMs }),
    true
  );
  registry.register(
    'transcoder',
    new FFmpegTranscoderProvider({ ffmpegPath: tools.ffmpegPath, timeoutMs: tools.timeoutMs }),
    true
  );

  registry.register(
    'metadata',
    new ExiftoolMetadataProvider({ exiftoolPath: tools.exiftoolPath, timeoutMs: tools.timeoutMs }),
    true
  );
  registry.register('metadata', new FfprobeMetadataProvider({ ffprobePath: tools.ffprobePath, timeoutMs: tools.timeoutMs }));
  registry.register('metadata', new FileMetadataProvider());

  logger.info(registry.summary(), 'Default providers registered');
  return registry;
}

export { ProviderRegistry } from './provider-registry.js';
