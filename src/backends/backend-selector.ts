/**
 * Backend Selector
 *
 * Probes acceleration backends once, in preference order, and memoizes the
 * first that initialises. The CPU reference backend is always the last
 * candidate, so selection never fails.
 */

import { firstSuccess, strategy, succeed, fail, type AttemptRecord, type Strategy } from '../cascade/cascade.js';
import { BACKENDS, type Backend } from '../types/media.types.js';
import type { AcceleratorName } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { withTimeout, type BackendProbes } from './probes.js';

const logger = createChildLogger({ service: 'backend-selector' });

export interface BackendSelection {
  backend: Backend;
  info: string;
  attempts: AttemptRecord<Backend>[];
}

export interface BackendSelectorOptions {
  /** Accelerators allowed to be probed; cpu is implicit */
  accelerators: readonly AcceleratorName[];
  probeTimeoutMs: number;
}

export class BackendSelector {
  private pending: Promise<BackendSelection> | null = null;
  private selected: BackendSelection | null = null;

  constructor(
    private readonly probes: BackendProbes,
    private readonly options: BackendSelectorOptions
  ) {}

  /**
   * Candidates in preference order; enabling never reorders
   */
  candidates(): Backend[] {
    return BACKENDS.filter(
      (backend) => backend === 'cpu' || this.options.accelerators.some((name) => name === backend)
    );
  }

  /**
   * Resolve the active backend, probing on first call only.
   * Concurrent first callers share the same probe run.
   */
  select(): Promise<BackendSelection> {
    if (!this.pending) {
      this.pending = this.probe().then((selection) => {
        this.selected = selection;
        return selection;
      });
    }
    return this.pending;
  }

  /**
   * Cached selection, or null if nothing has been probed yet
   */
  peek(): BackendSelection | null {
    return this.selected;
  }

  /**
   * Forget the cached selection so the next select() probes again
   */
  reset(): void {
    this.pending = null;
    this.selected = null;
  }

  private async probe(): Promise<BackendSelection> {
    const strategies: Strategy<string, Backend>[] = this.candidates().map((backend) =>
      strategy(backend, async () => {
        try {
          return succeed(await withTimeout(this.probes[backend].probe(), this.options.probeTimeoutMs, backend));
        } catch (error) {
          return fail<string>(error);
        }
      })
    );

    const result = await firstSuccess(strategies, {
      onAttempt: (backend, outcome, durationMs) => {
        if (outcome.status === 'failed') {
          logger.warn(
            { backend, durationMs, reason: getErrorMessage(outcome.error) },
            'Backend initialization failed, trying next candidate'
          );
        }
      },
    });

    if (result.ok) {
      logger.info({ backend: result.winner, info: result.value }, 'Backend selected');
      return { backend: result.winner, info: result.value, attempts: result.attempts };
    }

    // Only reachable if the cpu probe itself broke; the reference backend is still usable
    logger.error({ attempts: result.attempts }, 'Every backend probe failed, using cpu');
    return { backend: 'cpu', info: 'reference', attempts: result.attempts };
  }
}
