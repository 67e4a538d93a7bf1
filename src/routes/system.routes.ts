import type { FastifyInstance, FastifyReply } from 'fastify';

import type { OperationRouter } from '../operations/router.js';

export interface SystemRoutesOptions {
  router: OperationRouter;
}

/**
 * GET shortcuts for the system operations. They go through the router, so
 * they are validated, limited and counted like any other call.
 */
export async function systemRoutes(fastify: FastifyInstance, options: SystemRoutesOptions): Promise<void> {
  const forward = async (operation: string, requestId: string, reply: FastifyReply) => {
    const outcome = await options.router.dispatch({
      operation,
      payload: {},
      context: { trace_id: requestId },
    });
    return reply.status(outcome.ok ? 200 : 500).send(outcome.payload);
  };

  /**
   * Liveness probe
   */
  fastify.get('/health', { schema: { description: 'Liveness probe', tags: ['System'] } }, (request, reply) =>
    forward('health', request.id, reply)
  );

  fastify.get(
    '/v1/capabilities',
    { schema: { description: 'Capability card with the active backend', tags: ['System'] } },
    (request, reply) => forward('media.capabilities', request.id, reply)
  );

  fastify.get(
    '/v1/metrics',
    { schema: { description: 'Call counts and latency percentiles', tags: ['System'] } },
    (request, reply) => forward('media.metrics', request.id, reply)
  );
}
