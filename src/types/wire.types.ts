import type { Outcome } from '../operations/types.js';
import type { ErrorPayload } from '../utils/errors.js';

/**
 * Reply body for POST /v1/stimulate, also used for envelope errors
 */
export interface WireReply {
  ok: boolean;
  output: unknown;
  /** Whole milliseconds, rounded up */
  latency_ms: number;
  cost: number | null;
}

export function toWireReply(outcome: Outcome): WireReply {
  return {
    ok: outcome.ok,
    output: outcome.payload,
    latency_ms: Math.ceil(outcome.latencyMs),
    cost: outcome.cost,
  };
}

export function errorReply(payload: ErrorPayload, latencyMs: number): WireReply {
  return {
    ok: false,
    output: payload,
    latency_ms: Math.max(1, Math.ceil(latencyMs)),
    cost: null,
  };
}
