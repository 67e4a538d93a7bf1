import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { toValidationError, type OperationRouter } from '../operations/router.js';
import { ValidationError } from '../utils/errors.js';
import { toWireReply, type WireReply } from '../types/wire.types.js';

export interface StimulateRoutesOptions {
  router: OperationRouter;
}

/**
 * Request envelope; `input` is validated later against the operation's own schema
 */
export const envelopeSchema = z.object({
  op: z.string().min(1),
  input: z.record(z.unknown()).optional(),
  context: z.record(z.string()).optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

const replyJsonSchema = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    output: {},
    latency_ms: { type: 'integer' },
    cost: { type: ['number', 'null'] },
  },
} as const;

/**
 * Parse the request body into an envelope or throw a ValidationError
 */
export function parseEnvelope(body: unknown): Envelope {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('body: expected a JSON object', 'body', [
      { path: 'body', message: 'expected a JSON object' },
    ]);
  }
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

/**
 * Operation dispatch over HTTP. Every outcome, failed or not, is a 200;
 * only an unreadable envelope is a 400.
 */
export async function stimulateRoutes(fastify: FastifyInstance, options: StimulateRoutesOptions): Promise<void> {
  fastify.post<{ Body: unknown; Reply: WireReply }>(
    '/v1/stimulate',
    {
      schema: {
        description: 'Dispatch one operation',
        tags: ['Operations'],
        response: { 200: replyJsonSchema, 400: replyJsonSchema },
      },
    },
    async (request, reply) => {
      const envelope = parseEnvelope(request.body);

      const outcome = await options.router.dispatch({
        operation: envelope.op,
        payload: envelope.input,
        context: envelope.context ?? {},
      });

      return reply.send(toWireReply(outcome));
    }
  );
}
