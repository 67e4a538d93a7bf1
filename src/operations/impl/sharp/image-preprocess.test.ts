import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';

vi.mock('../../../utils/logger.js', () => ({
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

import { toCodecFormat } from './image-preprocess.js';
import { createTestRuntime, testConfig } from '../../../test/test-runtime.js';
import { fakeRawDecoder, greyImage } from '../../../test/fake-raw-decoder.js';

describe('image.preprocess', () => {
  let dir: string;
  let pngPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(tmpdir(), 'image-ops-'));
    pngPath = path.join(dir, 'photo.png');
    await sharp({ create: { width: 64, height: 48, channels: 3, background: { r: 200, g: 40, b: 40 } } })
      .png()
      .toFile(pngPath);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should map jpg to the jpeg codec', () => {
    expect(toCodecFormat('jpg')).toBe('jpeg');
    expect(toCodecFormat('webp')).toBe('webp');
  });

  it('should resize to the default 336x336 JPEG', async () => {
    const outputPath = path.join(dir, 'out', 'photo.jpg');
    const { router } = createTestRuntime();

    const outcome = await router.dispatch({
      operation: 'image.preprocess',
      payload: { input_path: pngPath, output_path: outputPath },
      context: {},
    });

    expect(outcome.payload).toEqual({
      processed: true,
      output_path: outputPath,
      width: 336,
      height: 336,
      format: 'jpg',
      quality: 90,
      backend_used: 'cpu',
    });
    const written = await sharp(outputPath).metadata();
    expect(written).toMatchObject({ format: 'jpeg', width: 336, height: 336 });
  });

  it('should accept upper-case formats', async () => {
    const outputPath = path.join(dir, 'photo.webp');
    const { router } = createTestRuntime();

    const outcome = await router.dispatch({
      operation: 'image.preprocess',
      payload: { input_path: pngPath, output_path: outputPath, width: 32, height: 16, format: 'WEBP' },
      context: {},
    });

    expect(outcome.payload).toMatchObject({ format: 'webp', width: 32, height: 16 });
    expect((await sharp(outputPath).metadata()).format).toBe('webp');
  });

  it('should decode RAW inputs through the extraction tiers', async () => {
    const rawPath = path.join(dir, 'IMG_0001.CR2');
    await writeFile(rawPath, 'raw');
    const decoder = fakeRawDecoder({ embedded: null, reduced: greyImage(100, 80) });
    const { router } = createTestRuntime({ decoder });

    const outcome = await router.dispatch({
      operation: 'image.preprocess',
      payload: { input_path: rawPath, output_path: path.join(dir, 'raw.png'), width: 50, height: 40, format: 'png' },
      context: {},
    });

    expect(outcome.payload).toMatchObject({ source_tier: 'FastDecode', width: 50, height: 40, format: 'png' });
    expect(decoder.decodeReduced).toHaveBeenCalledWith(rawPath);
  });

  it('should report the cpu fallback when the accelerator has no resizer', async () => {
    const { router, services } = createTestRuntime({
      config: testConfig({ ACCEL_BACKENDS: 'metal' }),
      workingBackends: ['metal'],
    });

    const outcome = await router.dispatch({
      operation: 'image.preprocess',
      payload: { input_path: pngPath, output_path: path.join(dir, 'gpu.jpg'), width: 10, height: 10 },
      context: {},
    });

    expect(outcome.ok).toBe(true);
    expect(outcome.payload).toMatchObject({ backend_used: 'cpu' });
    expect(services.selector.peek()?.backend).toBe('metal');
  });

  it('should reject unknown formats', async () => {
    const { router } = createTestRuntime();

    const outcome = await router.dispatch({
      operation: 'image.preprocess',
      payload: { input_path: pngPath, output_path: path.join(dir, 'x.bmp'), format: 'bmp' },
      context: {},
    });

    expect(outcome.payload).toMatchObject({ error: 'ValidationError', details: { field: 'format' } });
  });
});
