/**
 * Operation Router
 *
 * Turns one OperationRequest into exactly one Outcome:
 * lookup -> input validation -> bounded execution -> error conversion -> metrics.
 * Nothing thrown by a handler escapes dispatch().
 */

import type { ZodError } from 'zod';

import type { OperationRegistry } from './registry.js';
import type { OperationRequest, OperationServices, Outcome } from './types.js';
import { UNSUPPORTED_OPERATION_KEY, type MetricsCollector } from '../services/metrics.service.js';
import {
  AppError,
  UnsupportedOperationError,
  ValidationError,
  toErrorPayload,
  type ValidationIssue,
} from '../utils/errors.js';
import { createRequestLogger } from '../utils/logger.js';
import { createLimiter, type Limiter } from '../utils/parallel.js';
import { startStopwatch } from '../utils/timer.js';

/** Reported latency never drops to zero, even for a lookup miss */
const MIN_LATENCY_MS = 0.001;

/**
 * Convert zod issues into a ValidationError naming the first violated field
 */
export function toValidationError(error: ZodError): ValidationError {
  const issues: ValidationIssue[] = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  const field = first?.path ?? '';
  const message = first ? `${field || 'input'}: ${first.message}` : 'Validation failed';
  return new ValidationError(message, field, issues);
}

export interface RouterOptions {
  /** Handlers allowed to execute at once */
  concurrency: number;
}

export class OperationRouter {
  private readonly limiter: Limiter;

  constructor(
    private readonly registry: OperationRegistry,
    private readonly services: OperationServices,
    options: RouterOptions
  ) {
    this.limiter = createLimiter(options.concurrency);
  }

  private get metrics(): MetricsCollector {
    return this.services.metrics;
  }

  async dispatch(request: OperationRequest): Promise<Outcome> {
    const frozen = Object.freeze({ ...request, context: Object.freeze({ ...request.context }) });
    const traceId = frozen.context.trace_id ?? null;
    const elapsed = startStopwatch();
    const log = createRequestLogger(frozen.operation, traceId);

    const handler = this.registry.get(frozen.operation);
    // Unknown names share one metrics entry so callers cannot grow the table
    const metricsKey = handler ? frozen.operation : UNSUPPORTED_OPERATION_KEY;

    let outcome: Outcome;
    try {
      if (!handler) {
        throw new UnsupportedOperationError(frozen.operation, this.registry.getNames());
      }

      const parsed = handler.inputSchema.safeParse(frozen.payload ?? {});
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }

      const result = await this.limiter.run(() =>
        handler.execute(parsed.data, { services: this.services, context: frozen.context, traceId, logger: log })
      );
      outcome = {
        ok: true,
        payload: result.output,
        latencyMs: Math.max(elapsed(), MIN_LATENCY_MS),
        cost: result.cost ?? null,
      };
    } catch (error) {
      outcome = {
        ok: false,
        payload: toErrorPayload(error),
        latencyMs: Math.max(elapsed(), MIN_LATENCY_MS),
        cost: null,
      };

      const fields = { error: outcome.payload.error, message: outcome.payload.message };
      if (error instanceof AppError && error.isOperational) {
        log.warn(fields, 'Operation failed');
      } else {
        log.error({ ...fields, stack: error instanceof Error ? error.stack : undefined }, 'Operation crashed');
      }
    }

    this.metrics.record(
      metricsKey,
      outcome.ok,
      outcome.latencyMs,
      outcome.ok ? undefined : outcome.payload.error
    );

    if (outcome.ok) {
      log.info({ latencyMs: outcome.latencyMs }, 'Operation completed');
    }

    return outcome;
  }
}
