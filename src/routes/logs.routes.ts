/**
 * Log Routes
 */

import { FastifyInstance } from 'fastify';
import { config } from '../config';
import { ValidationError } from '../utils/errors';
import { parseLimit } from '../utils/validation';
import type { RouteDependencies } from './index';

export async function logsRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  const { logGrouper, monitor } = deps;

  // GET /logs - Recent grouped log entries, newest first
  fastify.get<{ Querystring: { limit?: string } }>('/logs', async (request, reply) => {
    const limit = parseLimit(
      request.query.limit,
      config.pagination.defaultPageSize,
      config.pagination.maxPageSize
    );

    const logs = logGrouper.getRecentLogs(limit);
    return reply.code(200).send({
      count: logs.length,
      logs,
    });
  });

  // POST /logs - Ingest a batch of raw log lines
  fastify.post<{ Body: unknown }>('/logs', async (request, reply) => {
    const body = request.body;
    if (typeof body !== 'object' || body === null || !('lines' in body) || !Array.isArray(body.lines)) {
      throw new ValidationError('lines must be an array of strings');
    }

    // Non-string items are skipped like any other malformed line
    const lines = body.lines.filter((line): line is string => typeof line === 'string');
    const { entries, alerts } = monitor.ingest(lines);

    return reply.code(200).send({
      received: body.lines.length,
      skipped: body.lines.length - lines.length,
      entries,
      alerts,
    });
  });

  // GET /monitor - Printer polling state
  fastify.get('/monitor', async (request, reply) => {
    return reply.code(200).send(monitor.getState());
  });
}
