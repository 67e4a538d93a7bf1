/**
 * Operation Implementations
 *
 * Organized by the collaborator each group leans on:
 * - raw/    - RAW decoder (previews, camera metadata)
 * - media/  - metadata reader cascade
 * - ffmpeg/ - audio and video transcoding
 * - sharp/  - image resize and encode
 * - system/ - discovery, metrics, health
 */

import type { OperationHandler } from '../types.js';
import { rawPreviewOperation } from './raw/raw-preview.js';
import { rawBatchPreviewOperation } from './raw/raw-batch-preview.js';
import { rawMetadataOperation } from './raw/raw-metadata.js';
import { mediaMetadataOperation } from './media/media-metadata.js';
import { audioPreprocessOperation, audioExtractOperation } from './ffmpeg/audio-preprocess.js';
import { extractFramesOperation } from './ffmpeg/extract-frames.js';
import { imagePreprocessOperation } from './sharp/image-preprocess.js';
import { capabilitiesOperation, metricsOperation, healthOperation } from './system/system.js';

export {
  rawPreviewOperation,
  rawBatchPreviewOperation,
  rawMetadataOperation,
  mediaMetadataOperation,
  audioPreprocessOperation,
  audioExtractOperation,
  extractFramesOperation,
  imagePreprocessOperation,
  capabilitiesOperation,
  metricsOperation,
  healthOperation,
};

/**
 * Every operation, in the order the capability card lists them
 */
export const allOperations: OperationHandler[] = [
  rawPreviewOperation,
  rawBatchPreviewOperation,
  rawMetadataOperation,
  mediaMetadataOperation,
  audioPreprocessOperation,
  audioExtractOperation,
  extractFramesOperation,
  imagePreprocessOperation,
  capabilitiesOperation,
  metricsOperation,
  healthOperation,
];
