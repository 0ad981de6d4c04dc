/**
 * Request Logging Middleware (registered as an onResponse hook)
 */

import { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../utils/logger';

export async function loggingMiddleware(request: FastifyRequest, reply: FastifyReply) {
  logger.info('request completed', {
    method: request.method,
    url: request.url,
    statusCode: reply.statusCode,
    duration: Math.round(reply.elapsedTime),
    userAgent: request.headers['user-agent'],
    ip: request.ip,
    reqId: request.id,
  });
}
