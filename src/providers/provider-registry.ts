import { createChildLogger } from '../utils/logger.js';
import type {
  RawDecoderProvider,
  TranscoderProvider,
  ImageCodecProvider,
  MetadataProvider,
} from './interfaces/index.js';

const logger = createChildLogger({ service: 'provider-registry' });

/**
 * Provider types supported by the registry
 */
export type ProviderType = 'rawDecoder' | 'transcoder' | 'imageCodec' | 'metadata';

/**
 * Provider map type
 */
export type ProviderMap = {
  rawDecoder: RawDecoderProvider;
  transcoder: TranscoderProvider;
  imageCodec: ImageCodecProvider;
  metadata: MetadataProvider;
};

type ProviderStore = { [K in ProviderType]: Map<string, ProviderMap[K]> };

/**
 * ProviderRegistry
 *
 * Registry for the external collaborator implementations.
 * Supports:
 * - Multiple implementations per provider type, kept in registration order
 * - Default provider selection
 * - Provider availability checking
 */
export class ProviderRegistry {
  private providers: ProviderStore = {
    rawDecoder: new Map(),
    transcoder: new Map(),
    imageCodec: new Map(),
    metadata: new Map(),
  };
  private defaults: Map<ProviderType, string> = new Map();

  /**
   * Register a provider
   * @param setAsDefault - Whether to set as default for this type
   */
  register<T extends ProviderType>(type: T, provider: ProviderMap[T], setAsDefault = false): void {
    const typeProviders: Map<string, ProviderMap[T]> = this.providers[type];
    const providerId = provider.providerId;
    typeProviders.set(providerId, provider);

    if (setAsDefault || !this.defaults.has(type)) {
      this.defaults.set(type, providerId);
    }

    logger.debug({ type, providerId, isDefault: this.defaults.get(type) === providerId }, 'Provider registered');
  }

  /**
   * Get a provider by type and optional ID (the default when no ID is given)
   */
  get<T extends ProviderType>(type: T, providerId?: string): ProviderMap[T] {
    const typeProviders: Map<string, ProviderMap[T]> = this.providers[type];
    if (typeProviders.size === 0) {
      throw new Error(`No providers registered for type: ${type}`);
    }

    const id = providerId ?? this.defaults.get(type);
    const provider = id === undefined ? undefined : typeProviders.get(id);
    if (!provider) {
      throw new Error(`Provider not found: ${type}/${id ?? '(default)'}`);
    }
    return provider;
  }

  /**
   * All registered providers for a type, in registration order
   */
  getAll<T extends ProviderType>(type: T): ProviderMap[T][] {
    const typeProviders: Map<string, ProviderMap[T]> = this.providers[type];
    return [...typeProviders.values()];
  }

  /**
   * Registered provider IDs per type
   */
  summary(): Record<ProviderType, string[]> {
    return {
      rawDecoder: [...this.providers.rawDecoder.keys()],
      transcoder: [...this.providers.transcoder.keys()],
      imageCodec: [...this.providers.imageCodec.keys()],
      metadata: [...this.providers.metadata.keys()],
    };
  }
}
