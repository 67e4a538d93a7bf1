/**
 * Providers Module
 *
 * Swappable implementations of the external collaborators:
 * - rawDecoder: camera RAW decoding (dcraw)
 * - transcoder: audio/video transcoding (ffmpeg)
 * - imageCodec: raster decode/encode (sharp)
 * - metadata: metadata readers, tried in registration order
 *
 * Usage:
 *
 * ```ts
 * import { setupDefaultProviders } from './providers/index.js';
 * const registry = setupDefaultProviders(getConfig());
 * const decoder = registry.get('rawDecoder');
 * ```
 */

export * from './interfaces/index.js';

export { ProviderRegistry, type ProviderType, type ProviderMap } from './provider-registry.js';

export { setupDefaultProviders } from './setup.js';

export * from './implementations/index.js';
