/**
 * Metadata Service
 *
 * Universal metadata through a cascade of readers (exiftool, ffprobe, plain
 * file info). The first reader that supports the file and succeeds wins.
 */

import { firstSuccess, strategy, succeed, decline, fail, type AttemptRecord, type Strategy } from '../cascade/cascade.js';
import type { MediaMetadata, MetadataProvider } from '../providers/interfaces/metadata.provider.js';
import { ExternalToolError, getErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'metadata' });

export interface MetadataResult {
  metadata: MediaMetadata;
  /** providerId of the reader that produced the metadata */
  backend: string;
  attempts: AttemptRecord[];
}

export class MetadataService {
  constructor(private readonly providers: () => MetadataProvider[]) {}

  async extract(path: string): Promise<MetadataResult> {
    const strategies: Strategy<MediaMetadata>[] = this.providers().map((provider) =>
      strategy(provider.providerId, async () => {
        if (!provider.isAvailable()) {
          return decline<MediaMetadata>('not configured');
        }
        if (!provider.supports(path)) {
          return decline<MediaMetadata>('unsupported file type');
        }
        try {
          return succeed(await provider.extract(path));
        } catch (error) {
          return fail<MediaMetadata>(error);
        }
      })
    );

    const result = await firstSuccess(strategies, {
      onAttempt: (name, outcome) => {
        if (outcome.status === 'failed') {
          logger.warn({ path, provider: name, error: getErrorMessage(outcome.error) }, 'Metadata reader failed');
        }
      },
    });

    if (!result.ok) {
      const tried = result.attempts.map((a) => `${a.name}: ${a.reason ?? a.status}`).join('; ');
      throw new ExternalToolError('metadata', `no reader could handle ${path} (${tried})`);
    }

    logger.debug({ path, provider: result.winner }, 'Metadata extracted');
    return { metadata: result.value, backend: result.winner, attempts: result.attempts };
  }
}
