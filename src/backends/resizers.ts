/**
 * Resizers
 *
 * One resizer per backend. Each declares the pixel formats it has a kernel for;
 * the transform service routes anything else to the reference resizer.
 * cuda and metal ship no kernels; compute offloads rgb8 to the compute service.
 */

import sharp from 'sharp';

import type { Backend, DecodedImage, PixelFormat } from '../types/media.types.js';
import { toChannelCount } from '../types/media.types.js';
import type { ComputeClient } from './compute-client.js';

export interface Resizer {
  readonly backend: Backend;
  /** Pixel formats this resizer implements */
  readonly formats: ReadonlySet<PixelFormat>;
  resize(image: DecodedImage, width: number, height: number): Promise<DecodedImage>;
}

export type Resizers = Record<Backend, Resizer>;

/**
 * Reference resizer: libvips Lanczos3 through sharp, exact output dimensions
 */
export class ReferenceResizer implements Resizer {
  readonly backend = 'cpu' as const;
  readonly formats: ReadonlySet<PixelFormat> = new Set<PixelFormat>(['gray8', 'graya8', 'rgb8', 'rgba8']);

  async resize(image: DecodedImage, width: number, height: number): Promise<DecodedImage> {
    const { data, info } = await sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    })
      .resize(width, height, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      channels: toChannelCount(info.channels),
    };
  }
}

/**
 * Accelerator resizer without kernels; every call is routed to the reference resizer
 */
export class AcceleratorResizer implements Resizer {
  readonly formats: ReadonlySet<PixelFormat>;

  constructor(
    readonly backend: Exclude<Backend, 'cpu'>,
    formats: PixelFormat[] = []
  ) {
    this.formats = new Set(formats);
  }

  async resize(_image: DecodedImage, _width: number, _height: number): Promise<DecodedImage> {
    throw new Error(`No ${this.backend} resize kernel available`);
  }
}

/**
 * Resizes rgb8 images on the compute service
 */
export class ComputeResizer implements Resizer {
  readonly backend = 'compute' as const;
  readonly formats: ReadonlySet<PixelFormat> = new Set<PixelFormat>(['rgb8']);

  constructor(private readonly client: ComputeClient) {}

  resize(image: DecodedImage, width: number, height: number): Promise<DecodedImage> {
    return this.client.resize(image, width, height);
  }
}

export function createDefaultResizers(compute: ComputeClient): Resizers {
  return {
    cuda: new AcceleratorResizer('cuda'),
    metal: new AcceleratorResizer('metal'),
    compute: new ComputeResizer(compute),
    cpu: new ReferenceResizer(),
  };
}
