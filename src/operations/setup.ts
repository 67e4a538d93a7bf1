/**
 * Operation Setup
 *
 * Wires providers, backend selection, services and the operation registry
 * into a router. Call once during application initialization.
 */

import type { AppConfig } from '../config/index.js';
import { BackendSelector } from '../backends/backend-selector.js';
import { ComputeClient } from '../backends/compute-client.js';
import { createDefaultProbes, type BackendProbes } from '../backends/probes.js';
import { createDefaultResizers, type Resizers } from '../backends/resizers.js';
import { ProviderRegistry } from '../providers/provider-registry.js';
import { setupDefaultProviders } from '../providers/setup.js';
import { TransformService } from '../services/transform.service.js';
import { PreviewPipelineService } from '../services/preview-pipeline.service.js';
import { MetadataService } from '../services/metadata.service.js';
import { MetricsCollector } from '../services/metrics.service.js';
import { CapabilityCardService } from '../services/capability-card.service.js';
import { createChildLogger } from '../utils/logger.js';
import { OperationRegistry } from './registry.js';
import { OperationRouter } from './router.js';
import { allOperations } from './impl/index.js';
import type { OperationHandler, OperationServices } from './types.js';

const logger = createChildLogger({ service: 'operation-setup' });

/**
 * Replaceable collaborators (tests swap in fakes)
 */
export interface RuntimeOverrides {
  providers?: ProviderRegistry;
  probes?: BackendProbes;
  resizers?: Resizers;
  operations?: OperationHandler[];
}

export interface Runtime {
  registry: OperationRegistry;
  services: OperationServices;
  router: OperationRouter;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const providers = overrides.providers ?? setupDefaultProviders(config, new ProviderRegistry());
  const compute = new ComputeClient({
    socketPath: config.backends.computeSocketPath,
    timeoutMs: config.tools.timeoutMs,
  });
  const probes =
    overrides.probes ??
    createDefaultProbes({
      nvidiaSmiPath: config.backends.nvidiaSmiPath,
      compute,
      probeTimeoutMs: config.backends.probeTimeoutMs,
    });
  const selector = new BackendSelector(probes, {
    accelerators: config.backends.accelerators,
    probeTimeoutMs: config.backends.probeTimeoutMs,
  });
  const transform = new TransformService(overrides.resizers ?? createDefaultResizers(compute));

  const registry = new OperationRegistry();
  registry.registerAll(overrides.operations ?? allOperations);

  const services: OperationServices = {
    config,
    providers,
    selector,
    transform,
    previews: new PreviewPipelineService({
      decoder: providers.get('rawDecoder'),
      codec: providers.get('imageCodec'),
      selector,
      transform,
    }),
    metadata: new MetadataService(() => providers.getAll('metadata')),
    metrics: new MetricsCollector(),
    card: new CapabilityCardService(registry, selector, config.service),
    startedAt: Date.now(),
  };

  const router = new OperationRouter(registry, services, { concurrency: config.worker.concurrency });

  logger.info(
    { operations: registry.getNames(), accelerators: config.backends.accelerators, concurrency: config.worker.concurrency },
    'Operations registered'
  );

  return { registry, services, router };
}
