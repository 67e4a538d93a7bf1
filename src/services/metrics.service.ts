/**
 * Metrics Collector
 *
 * Call counters and a latency histogram for the life of the process.
 * Updates happen synchronously on the event loop, so concurrent requests never
 * lose a count.
 */

import type { ErrorKind } from '../utils/errors.js';

/** Lower edge of the first histogram bucket, in ms */
const HISTOGRAM_FLOOR_MS = 0.01;
/** Buckets per doubling of latency */
const BUCKETS_PER_DOUBLING = 8;
/** 0.01ms * 2^40 is roughly 127 days; anything slower lands in the last bucket */
const BUCKET_COUNT = 40 * BUCKETS_PER_DOUBLING + 1;

/** Per-operation key shared by every name that is not registered */
export const UNSUPPORTED_OPERATION_KEY = '<unsupported>';

export interface OperationCounts {
  calls: number;
  successes: number;
  failures: number;
}

export interface LatencySummary {
  p50: number;
  p95: number;
  p99: number;
  avg: number;
  max: number;
}

export interface MetricsSnapshot {
  total_calls: number;
  successes: number;
  failures: number;
  success_rate: number;
  /** Failures keyed by ErrorKind */
  failures_by_category: Record<string, number>;
  latency_ms: LatencySummary;
  operations: Record<string, OperationCounts>;
}

/**
 * Fixed log-scale histogram: bucket i holds values up to FLOOR * 2^(i/8)
 */
export class LatencyHistogram {
  private readonly buckets = new Array<number>(BUCKET_COUNT).fill(0);
  private count = 0;
  private sum = 0;
  private maxValue = 0;

  static upperBound(index: number): number {
    return HISTOGRAM_FLOOR_MS * 2 ** (index / BUCKETS_PER_DOUBLING);
  }

  static bucketIndex(valueMs: number): number {
    if (!(valueMs > HISTOGRAM_FLOOR_MS)) {
      return 0;
    }
    const index = Math.ceil(BUCKETS_PER_DOUBLING * Math.log2(valueMs / HISTOGRAM_FLOOR_MS));
    return Math.min(index, BUCKET_COUNT - 1);
  }

  observe(valueMs: number): void {
    const value = Number.isFinite(valueMs) && valueMs > 0 ? valueMs : 0;
    this.buckets[LatencyHistogram.bucketIndex(value)] += 1;
    this.count += 1;
    this.sum += value;
    this.maxValue = Math.max(this.maxValue, value);
  }

  /**
   * Upper bound of the bucket holding the q-th ranked value, clamped to the largest observation
   */
  percentile(q: number): number {
    if (this.count === 0) {
      return 0;
    }
    const rank = Math.max(1, Math.ceil(q * this.count));
    let seen = 0;
    for (let i = 0; i < this.buckets.length; i++) {
      seen += this.buckets[i] ?? 0;
      if (seen >= rank) {
        return Math.min(LatencyHistogram.upperBound(i), this.maxValue);
      }
    }
    return this.maxValue;
  }

  get total(): number {
    return this.count;
  }

  get average(): number {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  get max(): number {
    return this.maxValue;
  }
}

export class MetricsCollector {
  private totalCalls = 0;
  private successes = 0;
  private failures = 0;
  private readonly failuresByCategory = new Map<ErrorKind, number>();
  private readonly operations = new Map<string, OperationCounts>();
  private readonly latency = new LatencyHistogram();

  /**
   * Record one finished request
   */
  record(operation: string, ok: boolean, latencyMs: number, errorKind?: ErrorKind): void {
    this.totalCalls += 1;

    let counts = this.operations.get(operation);
    if (!counts) {
      counts = { calls: 0, successes: 0, failures: 0 };
      this.operations.set(operation, counts);
    }
    counts.calls += 1;

    if (ok) {
      this.successes += 1;
      counts.successes += 1;
    } else {
      this.failures += 1;
      counts.failures += 1;
      const kind = errorKind ?? 'InternalError';
      this.failuresByCategory.set(kind, (this.failuresByCategory.get(kind) ?? 0) + 1);
    }

    this.latency.observe(latencyMs);
  }

  summary(): MetricsSnapshot {
    return {
      total_calls: this.totalCalls,
      successes: this.successes,
      failures: this.failures,
      success_rate: this.totalCalls === 0 ? 0 : this.successes / this.totalCalls,
      failures_by_category: Object.fromEntries(this.failuresByCategory),
      latency_ms: {
        p50: this.latency.percentile(0.5),
        p95: this.latency.percentile(0.95),
        p99: this.latency.percentile(0.99),
        avg: this.latency.average,
        max: this.latency.max,
      },
      operations: Object.fromEntries(
        [...this.operations].map(([name, counts]) => [name, { ...counts }])
      ),
    };
  }
}
