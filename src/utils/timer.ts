/**
 * Timing Utilities
 * High-resolution elapsed time for requests and per-stage timings for pipelines
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'timer' });

/** Default threshold in ms for logging slow stages */
const DEFAULT_SLOW_THRESHOLD_MS = 1000;

export interface StageTiming {
  stage: string;
  durationMs: number;
}

export interface StageTimerOptions {
  /** Threshold in ms above which a stage is logged at info (default: 1000) */
  slowThresholdMs?: number;
  /** Extra fields added to every stage log line */
  context?: Record<string, unknown>;
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Start a monotonic stopwatch.
 * The returned function reports elapsed milliseconds (fractional) each time it is called.
 */
export function startStopwatch(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1e6;
}

/**
 * Records how long each named stage of a pipeline takes
 */
export class StageTimer {
  private readonly timings: StageTiming[] = [];
  private readonly slowThresholdMs: number;
  private readonly context: Record<string, unknown>;

  constructor(options: StageTimerOptions = {}) {
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
    this.context = options.context ?? {};
  }

  /**
   * Time an async stage; the timing is recorded even if the stage throws
   */
  async time<T>(stage: string, operation: () => Promise<T>): Promise<T> {
    const elapsed = startStopwatch();
    try {
      return await operation();
    } finally {
      const durationMs = elapsed();
      this.timings.push({ stage, durationMs });

      const fields = { ...this.context, stage, durationMs, duration: formatDuration(durationMs) };
      if (durationMs > this.slowThresholdMs) {
        logger.info(fields, `Slow stage ${stage}: ${formatDuration(durationMs)}`);
      } else {
        logger.debug(fields, `Stage ${stage}: ${formatDuration(durationMs)}`);
      }
    }
  }

  /**
   * Stage durations keyed by stage name (repeated stages are summed)
   */
  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const { stage, durationMs } of this.timings) {
      record[stage] = (record[stage] ?? 0) + durationMs;
    }
    return record;
  }

  get totalMs(): number {
    return this.timings.reduce((sum, t) => sum + t.durationMs, 0);
  }
}
