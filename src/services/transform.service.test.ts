import { describe, it, expect, vi } from 'vitest';
import sharp from 'sharp';
import { TransformService, fitWithin } from './transform.service.js';
import { AcceleratorResizer, ReferenceResizer, createDefaultResizers, type Resizer } from '../backends/resizers.js';
import { ComputeClient } from '../backends/compute-client.js';
import { BACKENDS, type ChannelCount, type DecodedImage } from '../types/media.types.js';

const offlineCompute = new ComputeClient({ socketPath: '/nonexistent/compute.sock', timeoutMs: 100 });

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

async function solidImage(width: number, height: number, channels: ChannelCount): Promise<DecodedImage> {
  const { data, info } = await sharp({
    create: {
      width,
      height,
      channels: channels === 4 ? 4 : 3,
      background: { r: 200, g: 100, b: 50, alpha: 1 },
    },
  })
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (channels === 3 || channels === 4) {
    return { data, width: info.width, height: info.height, channels };
  }

  // Derive gray / gray+alpha layouts by hand from the RGB pixels
  const pixels = width * height;
  const out = Buffer.alloc(pixels * channels);
  for (let i = 0; i < pixels; i++) {
    out[i * channels] = data[i * 3];
    if (channels === 2) {
      out[i * channels + 1] = 255;
    }
  }
  return { data: out, width, height, channels };
}

describe('fitWithin', () => {
  it('should scale a landscape image to the max on its long side', () => {
    expect(fitWithin(4000, 3000, 2048)).toEqual({ width: 2048, height: 1536 });
  });

  it('should scale a portrait image', () => {
    expect(fitWithin(3000, 4000, 2048)).toEqual({ width: 1536, height: 2048 });
  });

  it('should scale a square image', () => {
    expect(fitWithin(3000, 3000, 2048)).toEqual({ width: 2048, height: 2048 });
  });

  it('should leave images within the limit untouched', () => {
    expect(fitWithin(1024, 768, 2048)).toEqual({ width: 1024, height: 768 });
    expect(fitWithin(2048, 1000, 2048)).toEqual({ width: 2048, height: 1000 });
  });

  it('should never produce a zero dimension', () => {
    expect(fitWithin(10000, 1, 100)).toEqual({ width: 100, height: 1 });
  });

  it('should floor the short side', () => {
    // 1000 * 333 / 999 = 333.33...
    expect(fitWithin(999, 333, 1000)).toEqual({ width: 999, height: 333 });
    expect(fitWithin(3000, 1999, 1000)).toEqual({ width: 1000, height: 666 });
  });
});

describe('ReferenceResizer', () => {
  it('should implement every pixel format', () => {
    expect([...new ReferenceResizer().formats].sort()).toEqual(['gray8', 'graya8', 'rgb8', 'rgba8']);
  });

  it.each([1, 2, 3, 4] as const)('should resize %i-channel images to exact dimensions', async (channels) => {
    const image = await solidImage(40, 30, channels);

    const resized = await new ReferenceResizer().resize(image, 17, 11);

    expect(resized.width).toBe(17);
    expect(resized.height).toBe(11);
    expect(resized.channels).toBe(channels);
    expect(resized.data.length).toBe(17 * 11 * channels);
  });

  it('should ignore aspect ratio when asked for other proportions', async () => {
    const image = await solidImage(100, 10, 3);

    const resized = await new ReferenceResizer().resize(image, 10, 100);

    expect([resized.width, resized.height]).toEqual([10, 100]);
  });
});

describe('AcceleratorResizer', () => {
  it('should ship with no kernels', async () => {
    const resizer = new AcceleratorResizer('cuda');
    const image = await solidImage(4, 4, 3);

    expect(resizer.formats.size).toBe(0);
    await expect(resizer.resize(image, 2, 2)).rejects.toThrow('No cuda resize kernel available');
  });
});

describe('TransformService', () => {
  it.each(BACKENDS)('should produce exact dimensions when %s is requested', async (backend) => {
    const service = new TransformService(createDefaultResizers(offlineCompute));
    const image = await solidImage(64, 48, 3);

    const result = await service.resize(image, 32, 24, backend);

    expect(result.image.width).toBe(32);
    expect(result.image.height).toBe(24);
    expect(result.requestedBackend).toBe(backend);
    expect(result.backendUsed).toBe('cpu');
    expect(result.fellBack).toBe(backend !== 'cpu');
  });

  it('should use an accelerator kernel when it implements the format', async () => {
    const image = await solidImage(8, 8, 3);
    const kernel: Resizer = {
      backend: 'metal',
      formats: new Set(['rgb8']),
      resize: vi.fn(async (_img: DecodedImage, width: number, height: number) => ({
        data: Buffer.alloc(width * height * 3),
        width,
        height,
        channels: 3 as const,
      })),
    };
    const service = new TransformService({ ...createDefaultResizers(offlineCompute), metal: kernel });

    const result = await service.resize(image, 4, 4, 'metal');

    expect(result.backendUsed).toBe('metal');
    expect(result.fellBack).toBe(false);
    expect(kernel.resize).toHaveBeenCalledWith(image, 4, 4);
  });

  it('should skip an accelerator that lacks the pixel format', async () => {
    const image = await solidImage(8, 8, 4);
    const resize = vi.fn();
    const kernel: Resizer = { backend: 'metal', formats: new Set(['rgb8']), resize };
    const service = new TransformService({ ...createDefaultResizers(offlineCompute), metal: kernel });

    const result = await service.resize(image, 4, 4, 'metal');

    expect(resize).not.toHaveBeenCalled();
    expect(result.backendUsed).toBe('cpu');
    expect(result.fellBack).toBe(true);
    expect(result.image.channels).toBe(4);
  });

  it('should fall back within the call when the accelerator kernel throws', async () => {
    const image = await solidImage(8, 8, 3);
    const kernel: Resizer = {
      backend: 'compute',
      formats: new Set(['rgb8']),
      resize: vi.fn(async () => {
        throw new Error('device lost');
      }),
    };
    const service = new TransformService({ ...createDefaultResizers(offlineCompute), compute: kernel });

    const result = await service.resize(image, 5, 3, 'compute');

    expect(result.backendUsed).toBe('cpu');
    expect(result.fellBack).toBe(true);
    expect([result.image.width, result.image.height]).toEqual([5, 3]);
  });

  it('should reject invalid targets', async () => {
    const image = await solidImage(8, 8, 3);
    const service = new TransformService(createDefaultResizers(offlineCompute));

    await expect(service.resize(image, 0, 4, 'cpu')).rejects.toThrow('Invalid resize target 0x4');
  });
});
