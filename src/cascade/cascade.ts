/**
 * Cascade
 *
 * Ordered "first success wins" iteration shared by the backend probe,
 * the RAW extraction tiers and the metadata cascade.
 *
 * Each strategy reports one of three outcomes:
 * - success: stop and return its value
 * - declined: the strategy does not apply (not available, nothing to offer)
 * - failed: the strategy applied but broke; move on
 */

import { getErrorMessage } from '../utils/errors.js';
import { startStopwatch } from '../utils/timer.js';

export type AttemptOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'declined'; reason: string }
  | { status: 'failed'; error: unknown };

export interface Strategy<T, N extends string = string> {
  readonly name: N;
  attempt(): Promise<AttemptOutcome<T>>;
}

export interface AttemptRecord<N extends string = string> {
  name: N;
  status: AttemptOutcome<unknown>['status'];
  reason?: string;
  durationMs: number;
}

export type CascadeResult<T, N extends string = string> =
  | { ok: true; winner: N; value: T; attempts: AttemptRecord<N>[] }
  | { ok: false; attempts: AttemptRecord<N>[] };

export interface CascadeOptions<T, N extends string = string> {
  /** Called after each attempt with the strategy name and its raw outcome */
  onAttempt?: (name: N, outcome: AttemptOutcome<T>, durationMs: number) => void;
}

export const succeed = <T>(value: T): AttemptOutcome<T> => ({ status: 'success', value });
export const decline = <T>(reason: string): AttemptOutcome<T> => ({ status: 'declined', reason });
export const fail = <T>(error: unknown): AttemptOutcome<T> => ({ status: 'failed', error });

/**
 * Run strategies in order until one succeeds.
 * A strategy that throws counts as failed.
 */
export async function firstSuccess<T, N extends string = string>(
  strategies: ReadonlyArray<Strategy<T, N>>,
  options: CascadeOptions<T, N> = {}
): Promise<CascadeResult<T, N>> {
  const attempts: AttemptRecord<N>[] = [];

  for (const strategy of strategies) {
    const elapsed = startStopwatch();
    let outcome: AttemptOutcome<T>;
    try {
      outcome = await strategy.attempt();
    } catch (error) {
      outcome = fail(error);
    }
    const durationMs = elapsed();

    options.onAttempt?.(strategy.name, outcome, durationMs);

    switch (outcome.status) {
      case 'success':
        attempts.push({ name: strategy.name, status: 'success', durationMs });
        return { ok: true, winner: strategy.name, value: outcome.value, attempts };
      case 'declined':
        attempts.push({ name: strategy.name, status: 'declined', reason: outcome.reason, durationMs });
        break;
      case 'failed':
        attempts.push({
          name: strategy.name,
          status: 'failed',
          reason: getErrorMessage(outcome.error),
          durationMs,
        });
        break;
    }
  }

  return { ok: false, attempts };
}

/**
 * Wrap a plain async function as a strategy
 */
export function strategy<T, N extends string>(
  name: N,
  attempt: () => Promise<AttemptOutcome<T>>
): Strategy<T, N> {
  return { name, attempt };
}
