import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { PreviewPipelineService, type PreviewOptions } from './preview-pipeline.service.js';
import { TransformService } from './transform.service.js';
import { createDefaultResizers } from '../backends/resizers.js';
import { ComputeClient } from '../backends/compute-client.js';
import { SharpImageCodecProvider } from '../providers/implementations/sharp-image-codec.provider.js';
import { NoUsablePreviewError } from '../utils/errors.js';
import type { Backend } from '../types/media.types.js';
import { fakeRawDecoder, greyImage, type DecoderScript } from '../test/fake-raw-decoder.js';

const DEFAULTS: PreviewOptions = {
  quality: 92,
  maxDimension: 2048,
  forceHighestTier: false,
  format: 'webp',
};

function selectorFor(backend: Backend) {
  return { select: vi.fn(async () => ({ backend, info: `${backend}-info`, attempts: [] })) };
}

function pipeline(script: DecoderScript, backend: Backend = 'cpu') {
  const decoder = fakeRawDecoder(script);
  const selector = selectorFor(backend);
  const transform = new TransformService(
    createDefaultResizers(new ComputeClient({ socketPath: '/nonexistent/compute.sock', timeoutMs: 100 }))
  );
  const service = new PreviewPipelineService({ decoder, codec: new SharpImageCodecProvider(), selector, transform });
  return { service, decoder, selector };
}

describe('PreviewPipelineService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should downscale a fast decode when there is no embedded preview', async () => {
    const { service, decoder } = pipeline({ embedded: null, reduced: greyImage(4000, 3000) });

    const result = await service.generate('/photos/a.nef', DEFAULTS);

    expect(result.width).toBe(2048);
    expect(result.height).toBe(1536);
    expect(result.sourceTier.name).toBe('FastDecode');
    expect(result.format).toBe('webp');
    expect(decoder.decodeFull).not.toHaveBeenCalled();

    const meta = await sharp(result.buffer).metadata();
    expect(meta.format).toBe('webp');
    expect(meta.width).toBe(2048);
    expect(meta.height).toBe(1536);
  });

  it('should keep images that already fit', async () => {
    const { service } = pipeline({ embedded: greyImage(160, 120) });

    const result = await service.generate('/photos/a.cr2', DEFAULTS);

    expect(result).toMatchObject({ width: 160, height: 120, backendUsed: 'cpu', fellBack: false });
    expect(result.timings.resize).toBeUndefined();
    expect(result.timings.extract).toBeGreaterThanOrEqual(0);
    expect(result.timings.encode).toBeGreaterThanOrEqual(0);
  });

  it('should keep the source size when maxDimension is null', async () => {
    const { service } = pipeline({ embedded: null, reduced: greyImage(300, 200) });

    const result = await service.generate('/photos/a.nef', { ...DEFAULTS, maxDimension: null, format: 'png' });

    expect(result.width).toBe(300);
    expect(result.height).toBe(200);
  });

  it('should report the fallback when the accelerator cannot resize', async () => {
    const { service } = pipeline({ embedded: greyImage(400, 100) }, 'cuda');

    const result = await service.generate('/photos/a.cr2', { ...DEFAULTS, maxDimension: 200, format: 'jpeg' });

    expect(result).toMatchObject({
      width: 200,
      height: 50,
      backend: 'cuda',
      backendUsed: 'cpu',
      fellBack: true,
    });
  });

  it('should only run the full decode when forced', async () => {
    const { service, decoder } = pipeline({ embedded: greyImage(160, 120), full: greyImage(320, 240) });

    const result = await service.generate('/photos/a.cr2', { ...DEFAULTS, forceHighestTier: true });

    expect(result.sourceTier).toEqual({ name: 'FullDecode', cost: 3, quality: 'full' });
    expect(decoder.tryEmbeddedPreview).not.toHaveBeenCalled();
  });

  it('should propagate NoUsablePreviewError', async () => {
    const { service } = pipeline({ embedded: null, reduced: new Error('bad'), full: new Error('worse') });

    await expect(service.generate('/photos/a.cr2', DEFAULTS)).rejects.toBeInstanceOf(NoUsablePreviewError);
  });

  describe('with an output path', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'preview-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the encoded preview', async () => {
      const { service } = pipeline({ embedded: greyImage(64, 48) });
      const outputPath = path.join(dir, 'nested', 'a.webp');

      const result = await service.generate('/photos/a.cr2', { ...DEFAULTS, outputPath });

      expect(result.outputPath).toBe(outputPath);
      expect(await readFile(outputPath)).toEqual(result.buffer);
      expect(result.timings.write).toBeGreaterThanOrEqual(0);
    });
  });
});
