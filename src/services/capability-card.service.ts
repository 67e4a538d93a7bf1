/**
 * Capability Card
 *
 * Self-description of the service: identity plus, per operation, its tags,
 * examples and JSON Schemas generated from the zod schemas. Built once from
 * the operation registry; only active_backend is resolved later.
 */

import { writeFile } from 'fs/promises';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { z } from 'zod';

import type { AppConfig } from '../config/index.js';
import type { BackendSelector } from '../backends/backend-selector.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { OperationExample, OperationHandler } from '../operations/types.js';
import type { Backend } from '../types/media.types.js';
import { ensureParentDir } from '../utils/fs.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'capability-card' });

const CARD_DESCRIPTION =
  'Media preprocessing: RAW previews and metadata, audio, video and image transforms for model input';
const CARD_DIVISION = 'media';
const CARD_SUBSYSTEM = 'preprocessing';

export interface OperationCard {
  name: string;
  description: string;
  tags: string[];
  examples: OperationExample[];
  idempotent: boolean;
  side_effects: string[];
  latency_target_ms: number;
  input_schema: unknown;
  output_schema: unknown;
}

export interface CapabilityCard {
  name: string;
  version: string;
  description: string;
  division: string;
  subsystem: string;
  tags: string[];
  operations: OperationCard[];
}

export interface CapabilityDescription extends CapabilityCard {
  /** Backend chosen by the probe for this process */
  active_backend: Backend;
}

/**
 * JSON Schema for a zod schema, inlined (no $ref) so each entry stands alone
 */
export function toJsonSchema(schema: z.ZodTypeAny): unknown {
  return zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });
}

function describeOperation(handler: OperationHandler): OperationCard {
  return {
    name: handler.name,
    description: handler.description,
    tags: handler.tags,
    examples: handler.examples,
    idempotent: handler.idempotent,
    side_effects: handler.sideEffects,
    latency_target_ms: handler.latencyTargetMs,
    input_schema: toJsonSchema(handler.inputSchema),
    output_schema: toJsonSchema(handler.outputSchema),
  };
}

export class CapabilityCardService {
  private card: CapabilityCard | null = null;

  constructor(
    private readonly operations: OperationRegistry,
    private readonly selector: Pick<BackendSelector, 'select'>,
    private readonly service: AppConfig['service']
  ) {}

  /**
   * Static card; built on first use and reused afterwards
   */
  build(): CapabilityCard {
    if (!this.card) {
      const handlers = this.operations.getAll();
      const tags = [...new Set(handlers.flatMap((h) => h.tags))].sort();
      this.card = {
        name: this.service.name,
        version: this.service.version,
        description: CARD_DESCRIPTION,
        division: CARD_DIVISION,
        subsystem: CARD_SUBSYSTEM,
        tags,
        operations: handlers.map(describeOperation),
      };
      logger.debug({ operations: handlers.length }, 'Capability card built');
    }
    return this.card;
  }

  /**
   * Card plus the active backend (probing on first call)
   */
  async describe(): Promise<CapabilityDescription> {
    const { backend } = await this.selector.select();
    return { ...this.build(), active_backend: backend };
  }

  /**
   * Write the static card as a JSON manifest
   */
  async exportTo(filePath: string): Promise<CapabilityCard> {
    const card = this.build();
    await ensureParentDir(filePath);
    await writeFile(filePath, `${JSON.stringify(card, null, 2)}\n`);
    logger.info({ filePath, operations: card.operations.length }, 'Capability card exported');
    return card;
  }
}
