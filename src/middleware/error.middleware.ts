import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { AppError, toErrorPayload } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { errorReply } from '../types/wire.types.js';

/**
 * Global error handler for Fastify.
 * Only transport-level failures land here; operation errors are already
 * outcomes by the time a route replies.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const logger = getLogger();

  // Envelope validation and other application errors
  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, requestId: request.id }, 'Non-operational error occurred');
    } else {
      logger.warn({ requestId: request.id, error: error.code, message: error.message }, 'Request rejected');
    }

    reply.status(error.statusCode).send(errorReply(toErrorPayload(error), reply.elapsedTime));
    return;
  }

  // Fastify body parsing and content-type errors
  if (error.validation || (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500)) {
    logger.warn({ requestId: request.id, code: error.code, message: error.message }, 'Malformed request');
    reply.status(error.statusCode ?? 400).send(
      errorReply(
        {
          error: 'ValidationError',
          message: error.message,
          details: { field: 'body', issues: [{ path: 'body', message: error.message }] },
        },
        reply.elapsedTime
      )
    );
    return;
  }

  // Unknown errors
  logger.error({ err: error, requestId: request.id }, 'Unhandled error occurred');

  reply.status(500).send(
    errorReply({ error: 'InternalError', message: 'An unexpected error occurred' }, reply.elapsedTime)
  );
}
