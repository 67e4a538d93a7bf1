import { writeFile } from 'fs/promises';

import { createChildLogger } from '../utils/logger.js';
import { StageTimer } from '../utils/timer.js';
import { ensureParentDir } from '../utils/fs.js';
import type { AttemptRecord } from '../cascade/cascade.js';
import type { BackendSelector } from '../backends/backend-selector.js';
import type { RawDecoderProvider } from '../providers/interfaces/raw-decoder.provider.js';
import type { ImageCodecProvider } from '../providers/interfaces/image-codec.provider.js';
import type { Backend, ExtractionTier, ExtractionTierName, PreviewFormat } from '../types/media.types.js';
import { extractWithTiers } from './extraction-tiers.js';
import { fitWithin, type TransformService } from './transform.service.js';

const logger = createChildLogger({ service: 'preview-pipeline' });

export interface PreviewOptions {
  /** Encoder quality 1-100 */
  quality: number;
  /** Longest output side; null keeps the source size */
  maxDimension: number | null;
  forceHighestTier: boolean;
  format: PreviewFormat;
  /** Write the encoded preview here as well as returning it */
  outputPath?: string;
}

export interface PreviewResult {
  buffer: Buffer;
  width: number;
  height: number;
  format: PreviewFormat;
  quality: number;
  outputPath: string | null;
  sourceTier: ExtractionTier;
  attempts: AttemptRecord<ExtractionTierName>[];
  /** Backend chosen by the probe */
  backend: Backend;
  /** Backend that actually ran the resize */
  backendUsed: Backend;
  fellBack: boolean;
  /** Milliseconds per stage: extract, resize, encode, write */
  timings: Record<string, number>;
}

export interface PreviewPipelineDeps {
  decoder: RawDecoderProvider;
  codec: ImageCodecProvider;
  selector: Pick<BackendSelector, 'select'>;
  transform: TransformService;
}

/**
 * PreviewPipelineService
 *
 * RAW file in, encoded preview out: extraction tiers, then an aspect-preserving
 * resize on the selected backend, then encode.
 */
export class PreviewPipelineService {
  constructor(private readonly deps: PreviewPipelineDeps) {}

  async generate(path: string, options: PreviewOptions): Promise<PreviewResult> {
    const timer = new StageTimer({ context: { path } });

    const extraction = await timer.time('extract', () =>
      extractWithTiers(this.deps.decoder, path, { forceHighestTier: options.forceHighestTier })
    );
    const { backend } = await this.deps.selector.select();

    let image = extraction.image;
    let backendUsed: Backend = backend;
    let fellBack = false;

    if (options.maxDimension !== null) {
      const target = fitWithin(image.width, image.height, options.maxDimension);
      if (target.width !== image.width || target.height !== image.height) {
        const resized = await timer.time('resize', () =>
          this.deps.transform.resize(extraction.image, target.width, target.height, backend)
        );
        image = resized.image;
        backendUsed = resized.backendUsed;
        fellBack = resized.fellBack;
      }
    }

    const encoded = await timer.time('encode', () =>
      this.deps.codec.encode(image, { format: options.format, quality: options.quality })
    );

    const outputPath = options.outputPath ?? null;
    if (outputPath) {
      await timer.time('write', async () => {
        await ensureParentDir(outputPath);
        await writeFile(outputPath, encoded.buffer);
      });
    }

    logger.info(
      {
        path,
        sourceTier: extraction.sourceTier.name,
        width: encoded.width,
        height: encoded.height,
        bytes: encoded.buffer.length,
        backend,
        backendUsed,
        durationMs: timer.totalMs,
      },
      'Preview generated'
    );

    return {
      buffer: encoded.buffer,
      width: encoded.width,
      height: encoded.height,
      format: encoded.format,
      quality: options.quality,
      outputPath,
      sourceTier: extraction.sourceTier,
      attempts: extraction.attempts,
      backend,
      backendUsed,
      fellBack,
      timings: timer.toRecord(),
    };
  }
}
