import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
  createRequestLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { createRuntime } from './setup.js';
import { defineOperation } from './types.js';
import { scriptedProbes, testConfig } from '../test/test-runtime.js';

const pingOperation = defineOperation({
  name: 'test.ping',
  description: 'Ping',
  tags: [],
  examples: [],
  idempotent: true,
  sideEffects: [],
  latencyTargetMs: 1,
  inputSchema: z.object({}),
  outputSchema: z.object({}),
  async execute() {
    return { output: {} };
  },
});

describe('createRuntime', () => {
  it('should wire the default providers and every built-in operation', () => {
    const { registry, services } = createRuntime(testConfig());

    expect(registry.size).toBe(11);
    expect(services.providers.summary()).toEqual({
      rawDecoder: ['dcraw'],
      transcoder: ['ffmpeg'],
      imageCodec: ['sharp'],
      metadata: ['exiftool', 'ffprobe', 'file'],
    });
    expect(services.selector.peek()).toBeNull();
  });

  it('should restrict backend candidates to the configured accelerators', () => {
    const { services } = createRuntime(testConfig({ ACCEL_BACKENDS: 'compute,cuda' }), {
      probes: scriptedProbes(),
    });

    expect(services.selector.candidates()).toEqual(['cuda', 'compute', 'cpu']);
  });

  it('should register replacement operations instead of the built-ins', async () => {
    const { registry, router } = createRuntime(testConfig(), { operations: [pingOperation] });

    expect(registry.getNames()).toEqual(['test.ping']);
    expect((await router.dispatch({ operation: 'health', payload: {}, context: {} })).payload).toMatchObject({
      error: 'UnsupportedOperation',
      details: { available: ['test.ping'] },
    });
  });

  it('should fail on duplicate operation names', () => {
    expect(() => createRuntime(testConfig(), { operations: [pingOperation, pingOperation] })).toThrow(
      "Operation 'test.ping' is already registered"
    );
  });
});
