/**
 * Operation Types
 *
 * Core type definitions for the operation dispatch layer.
 * Operations are named units of work with a zod-described input and output;
 * the router validates, schedules and measures them.
 *
 * This module exports:
 * - OperationHandler: a registered operation
 * - OperationContext / OperationServices: what a handler can reach
 * - OperationRequest / Outcome: the router's request and result shapes
 */

import type { Logger } from 'pino';
import type { z } from 'zod';

import type { AppConfig } from '../config/index.js';
import type { BackendSelector } from '../backends/backend-selector.js';
import type { ProviderRegistry } from '../providers/provider-registry.js';
import type { TransformService } from '../services/transform.service.js';
import type { PreviewPipelineService } from '../services/preview-pipeline.service.js';
import type { MetadataService } from '../services/metadata.service.js';
import type { MetricsCollector } from '../services/metrics.service.js';
import type { CapabilityCardService } from '../services/capability-card.service.js';
import type { ErrorPayload } from '../utils/errors.js';

/**
 * Shared services handed to every handler
 */
export interface OperationServices {
  config: AppConfig;
  providers: ProviderRegistry;
  selector: BackendSelector;
  transform: TransformService;
  previews: PreviewPipelineService;
  metadata: MetadataService;
  metrics: MetricsCollector;
  card: CapabilityCardService;
  /** Process start, epoch ms */
  startedAt: number;
}

/**
 * Per-request context
 */
export interface OperationContext {
  services: OperationServices;
  /** Caller-supplied context map, passed through untouched */
  context: Readonly<Record<string, string>>;
  /** context.trace_id, when the caller sent one */
  traceId: string | null;
  /** Request logger bound to the operation name and trace id */
  logger: Logger;
}

/**
 * What a handler returns: its output plus an optional cost figure
 */
export interface HandlerResult<O> {
  output: O;
  cost?: number | null;
}

/**
 * Example invocation shown on the capability card
 */
export interface OperationExample {
  description: string;
  input: Record<string, unknown>;
}

/**
 * A registered operation
 */
export interface OperationHandler<I extends z.ZodTypeAny = z.ZodTypeAny, O extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Unique dotted name, e.g. 'raw.preview' */
  name: string;
  description: string;
  tags: string[];
  examples: OperationExample[];
  /** Same input always gives the same output */
  idempotent: boolean;
  /** Effects outside the reply, e.g. 'writes output_path' */
  sideEffects: string[];
  latencyTargetMs: number;
  inputSchema: I;
  outputSchema: O;

  execute(input: z.output<I>, ctx: OperationContext): Promise<HandlerResult<z.input<O>>>;
}

/**
 * Identity helper that keeps a handler's schema types for inference
 */
export function defineOperation<I extends z.ZodTypeAny, O extends z.ZodTypeAny>(
  handler: OperationHandler<I, O>
): OperationHandler<I, O> {
  return handler;
}

/**
 * A request as the router receives it; frozen once dispatched
 */
export interface OperationRequest {
  operation: string;
  payload: unknown;
  context: Readonly<Record<string, string>>;
}

/**
 * Exactly one per request
 */
export type Outcome =
  | { ok: true; payload: unknown; latencyMs: number; cost: number | null }
  | { ok: false; payload: ErrorPayload; latencyMs: number; cost: number | null };
