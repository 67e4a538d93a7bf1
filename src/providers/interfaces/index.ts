/**
 * Provider Interfaces
 *
 * Contracts for the external collaborators (decoder, transcoder, codec, metadata readers),
 * so implementations can be swapped or faked.
 */

export * from './raw-decoder.provider.js';
export * from './transcoder.provider.js';
export * from './image-codec.provider.js';
export * from './metadata.provider.js';
