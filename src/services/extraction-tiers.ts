/**
 * Extraction Tiers
 *
 * Gets a usable raster out of a RAW file by trying progressively more
 * expensive sources: the camera-embedded preview, a half-size decode, then a
 * full decode. The first usable image wins.
 */

import { firstSuccess, strategy, succeed, decline, fail, type AttemptRecord, type Strategy } from '../cascade/cascade.js';
import type { RawDecoderProvider } from '../providers/interfaces/raw-decoder.provider.js';
import {
  EXTRACTION_TIERS,
  type DecodedImage,
  type ExtractionTier,
  type ExtractionTierName,
} from '../types/media.types.js';
import { NoUsablePreviewError, RawDecodeError, getErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'extraction-tiers' });

export interface ExtractionOptions {
  /** Skip straight to the full decode */
  forceHighestTier?: boolean;
}

export interface ExtractionResult {
  image: DecodedImage;
  sourceTier: ExtractionTier;
  attempts: AttemptRecord<ExtractionTierName>[];
}

function tierByName(name: ExtractionTierName): ExtractionTier {
  const tier = EXTRACTION_TIERS.find((t) => t.name === name);
  if (!tier) {
    throw new Error(`Unknown extraction tier: ${name}`);
  }
  return tier;
}

/**
 * Tiers to try, cheapest first
 */
export function tiersFor(options: ExtractionOptions = {}): ExtractionTier[] {
  const ordered = [...EXTRACTION_TIERS].sort((a, b) => a.cost - b.cost);
  return options.forceHighestTier ? ordered.slice(-1) : ordered;
}

function decodeTier(decoder: RawDecoderProvider, tier: ExtractionTierName, path: string): Promise<DecodedImage | null> {
  switch (tier) {
    case 'EmbeddedPreview':
      return decoder.tryEmbeddedPreview(path);
    case 'FastDecode':
      return decoder.decodeReduced(path);
    case 'FullDecode':
      return decoder.decodeFull(path);
  }
}

/**
 * Run the tiers against one file.
 * Throws NoUsablePreviewError when every tier declines or fails.
 */
export async function extractWithTiers(
  decoder: RawDecoderProvider,
  path: string,
  options: ExtractionOptions = {}
): Promise<ExtractionResult> {
  const strategies: Strategy<DecodedImage, ExtractionTierName>[] = tiersFor(options).map((tier) =>
    strategy(tier.name, async () => {
      try {
        const image = await decodeTier(decoder, tier.name, path);
        if (!image) {
          return decline<DecodedImage>('no embedded preview');
        }
        if (image.width === 0 || image.height === 0) {
          return decline<DecodedImage>(`unusable ${image.width}x${image.height} image`);
        }
        return succeed(image);
      } catch (error) {
        return fail<DecodedImage>(error);
      }
    })
  );

  const result = await firstSuccess(strategies, {
    onAttempt: (tier, outcome, durationMs) => {
      if (outcome.status === 'failed') {
        if (outcome.error instanceof RawDecodeError && outcome.error.corruptSource) {
          logger.warn({ path, tier, durationMs, error: outcome.error.message }, 'Source appears corrupt');
        } else {
          logger.warn({ path, tier, durationMs, error: getErrorMessage(outcome.error) }, 'Extraction tier failed');
        }
      } else if (outcome.status === 'declined') {
        logger.debug({ path, tier, reason: outcome.reason }, 'Extraction tier declined');
      }
    },
  });

  if (!result.ok) {
    throw new NoUsablePreviewError(
      path,
      result.attempts.map((a) => ({ tier: a.name, status: a.status, reason: a.reason }))
    );
  }

  logger.debug(
    { path, tier: result.winner, width: result.value.width, height: result.value.height },
    'Extraction tier succeeded'
  );
  return { image: result.value, sourceTier: tierByName(result.winner), attempts: result.attempts };
}
