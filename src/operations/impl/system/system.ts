/**
 * System operations: media.capabilities, media.metrics, health
 */

import { z } from 'zod';

import { defineOperation } from '../../types.js';
import { BACKENDS } from '../../../types/media.types.js';

const noInput = z.object({}).strict();

const operationCardSchema = z.object({
  name: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  examples: z.array(z.object({ description: z.string(), input: z.record(z.unknown()) })),
  idempotent: z.boolean(),
  side_effects: z.array(z.string()),
  latency_target_ms: z.number(),
  input_schema: z.unknown(),
  output_schema: z.unknown(),
});

const capabilitiesOutput = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string(),
  division: z.string(),
  subsystem: z.string(),
  tags: z.array(z.string()),
  operations: z.array(operationCardSchema),
  active_backend: z.enum(BACKENDS),
});

export const capabilitiesOperation = defineOperation({
  name: 'media.capabilities',
  description: 'Return the capability card: every operation with its schemas, plus the active backend',
  tags: ['metadata', 'discovery'],
  examples: [{ description: 'Full card', input: {} }],
  idempotent: true,
  sideEffects: [],
  latencyTargetMs: 10,
  inputSchema: noInput,
  outputSchema: capabilitiesOutput,

  async execute(_input, ctx) {
    return { output: await ctx.services.card.describe() };
  },
});

const countsSchema = z.object({ calls: z.number().int(), successes: z.number().int(), failures: z.number().int() });

const metricsOutput = z.object({
  total_calls: z.number().int(),
  successes: z.number().int(),
  failures: z.number().int(),
  success_rate: z.number(),
  failures_by_category: z.record(z.number().int()),
  latency_ms: z.object({ p50: z.number(), p95: z.number(), p99: z.number(), avg: z.number(), max: z.number() }),
  operations: z.record(countsSchema),
});

export const metricsOperation = defineOperation({
  name: 'media.metrics',
  description: 'Call counts, failure categories and latency percentiles since the process started',
  tags: ['metrics', 'observability'],
  examples: [{ description: 'Current snapshot', input: {} }],
  idempotent: false,
  sideEffects: [],
  latencyTargetMs: 5,
  inputSchema: noInput,
  outputSchema: metricsOutput,

  async execute(_input, ctx) {
    return { output: ctx.services.metrics.summary() };
  },
});

const healthOutput = z.object({
  status: z.literal('ok'),
  service: z.string(),
  version: z.string(),
  uptime_ms: z.number().int(),
  backend: z.enum(BACKENDS).nullable().describe('Active backend, null until the first probe'),
});

export const healthOperation = defineOperation({
  name: 'health',
  description: 'Liveness check with service identity and uptime',
  tags: ['health', 'observability'],
  examples: [{ description: 'Ping', input: {} }],
  idempotent: false,
  sideEffects: [],
  latencyTargetMs: 5,
  inputSchema: noInput,
  outputSchema: healthOutput,

  async execute(_input, ctx) {
    const { config, selector, startedAt } = ctx.services;
    return {
      output: {
        status: 'ok' as const,
        service: config.service.name,
        version: config.service.version,
        uptime_ms: Math.max(0, Date.now() - startedAt),
        backend: selector.peek()?.backend ?? null,
      },
    };
  },
});
