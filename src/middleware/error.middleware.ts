/**
 * Error Handling Middleware
 */

import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { APIError, InternalServerError, errorEnvelope } from '../utils/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('http');

export async function errorHandler(
  error: FastifyError | APIError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const context = { path: request.url, method: request.method, reqId: request.id };

  // Our own errors carry their status and code
  if (error instanceof APIError) {
    log.warn(`${error.code}: ${error.message}`, { ...context, statusCode: error.statusCode });
    return reply.code(error.statusCode).send(error.toJSON());
  }

  // Schema validation failures
  if (error.validation) {
    log.warn('Request failed schema validation', { ...context, validation: error.validation });
    return reply.code(400).send(errorEnvelope('VALIDATION_ERROR', error.message, error.validation));
  }

  // Malformed JSON bodies, oversized payloads and other client errors raised by Fastify
  if (error.statusCode !== undefined && error.statusCode < 500) {
    log.warn(`Client error: ${error.message}`, { ...context, statusCode: error.statusCode });
    return reply.code(error.statusCode).send(errorEnvelope(error.code || 'BAD_REQUEST', error.message));
  }

  log.error('Unexpected error', { ...context, error: error.message, stack: error.stack });
  const internal = new InternalServerError();
  return reply.code(error.statusCode ?? internal.statusCode).send(internal.toJSON());
}
