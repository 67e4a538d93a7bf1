/**
 * Transform Service
 *
 * Resizes decoded images on the selected backend. When that backend has no
 * kernel for the image's pixel format, or its kernel fails, the call falls back
 * to the reference resizer and says so in the result.
 */

import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage, InternalError } from '../utils/errors.js';
import { pixelFormatOf, type Backend, type DecodedImage, type Dimensions } from '../types/media.types.js';
import type { Resizers } from '../backends/resizers.js';

const logger = createChildLogger({ service: 'transform' });

export interface ResizeResult {
  image: DecodedImage;
  requestedBackend: Backend;
  backendUsed: Backend;
  fellBack: boolean;
}

/**
 * Aspect-preserving target dimensions with the longer side at most `max`.
 * Returns the source dimensions when they already fit.
 */
export function fitWithin(width: number, height: number, max: number): Dimensions {
  if (width <= max && height <= max) {
    return { width, height };
  }
  if (width >= height) {
    return { width: max, height: Math.max(1, Math.floor((max * height) / width)) };
  }
  return { width: Math.max(1, Math.floor((max * width) / height)), height: max };
}

export class TransformService {
  constructor(private readonly resizers: Resizers) {}

  async resize(image: DecodedImage, width: number, height: number, backend: Backend): Promise<ResizeResult> {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new InternalError(`Invalid resize target ${width}x${height}`);
    }

    const format = pixelFormatOf(image);
    const resizer = this.resizers[backend];

    if (backend !== 'cpu') {
      if (!resizer.formats.has(format)) {
        logger.debug({ backend, format }, 'No kernel for pixel format, using reference resizer');
      } else {
        try {
          const resized = await resizer.resize(image, width, height);
          return { image: resized, requestedBackend: backend, backendUsed: backend, fellBack: false };
        } catch (error) {
          logger.warn(
            { backend, format, error: getErrorMessage(error) },
            'Backend resize failed, using reference resizer'
          );
        }
      }
    }

    const resized = await this.resizers.cpu.resize(image, width, height);
    return {
      image: resized,
      requestedBackend: backend,
      backendUsed: 'cpu',
      fellBack: backend !== 'cpu',
    };
  }
}
