/**
 * Alert Routes
 */

import { FastifyInstance } from 'fastify';
import { generateAlertId } from '../core';
import type { AlertCandidate, JsonObject } from '../types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { assertObjectPayload, isJsonObject, isLogType, parseLimit } from '../utils/validation';
import type { RouteDependencies } from './index';

function parseDetails(body: JsonObject): JsonObject | undefined {
  if (body.details === undefined || body.details === null) return undefined;
  if (!isJsonObject(body.details)) {
    throw new ValidationError('details must be a JSON object');
  }
  return body.details;
}

function parseCandidate(payload: unknown): AlertCandidate {
  const body = assertObjectPayload(payload, 'Alert payload');

  if (!isLogType(body.type)) {
    throw new ValidationError('type must be one of info, warning, error');
  }
  if (typeof body.message !== 'string' || body.message.trim() === '') {
    throw new ValidationError('message is required');
  }

  const candidate: AlertCandidate = { type: body.type, message: body.message };
  const details = parseDetails(body);
  if (details) candidate.details = details;
  return candidate;
}

export async function alertsRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  const { alertManager } = deps;

  // GET /alerts - Active alerts (including local alerts)
  fastify.get('/alerts', async (request, reply) => {
    const alerts = alertManager.getActiveAlerts();
    return reply.code(200).send({
      count: alerts.length,
      alerts,
    });
  });

  // GET /alerts/history - Most recent history records
  fastify.get<{ Querystring: { limit?: string } }>('/alerts/history', async (request, reply) => {
    const limit = parseLimit(request.query.limit, 100, 1000);
    const history = alertManager.getAlertHistory(limit);
    return reply.code(200).send({
      count: history.length,
      history,
    });
  });

  // POST /alerts - Submit an alert candidate
  fastify.post<{ Body: unknown }>('/alerts', async (request, reply) => {
    const candidate = parseCandidate(request.body);
    const existed = alertManager.getAlert(generateAlertId(candidate)) !== undefined;

    const alert = alertManager.processAlert(candidate);
    if (!alert) {
      return reply.code(202).send({ alert: null, suppressed: true });
    }

    return reply.code(existed ? 200 : 201).send({ alert, suppressed: false });
  });

  // POST /alerts/:id/resolve - Resolve an active alert
  fastify.post<{ Params: { id: string } }>('/alerts/:id/resolve', async (request, reply) => {
    const { id } = request.params;

    const alert = alertManager.resolveAlert(id);
    if (!alert) {
      throw new NotFoundError('Alert', id);
    }

    return reply.code(200).send({ alert });
  });

  // POST /alerts/local - Raise or refresh a UI-originated alert
  fastify.post<{ Body: unknown }>('/alerts/local', async (request, reply) => {
    const body = assertObjectPayload(request.body, 'Local alert payload');

    if (typeof body.id !== 'string' || body.id.trim() === '') {
      throw new ValidationError('id is required');
    }
    if (!isLogType(body.type)) {
      throw new ValidationError('type must be one of info, warning, error');
    }
    if (typeof body.message !== 'string' || body.message.trim() === '') {
      throw new ValidationError('message is required');
    }

    const alert = alertManager.addLocalAlert({
      id: body.id,
      type: body.type,
      message: body.message,
      details: parseDetails(body),
    });

    return reply.code(201).send({ alert });
  });

  // DELETE /alerts/local/:id - Clear a UI-originated alert
  fastify.delete<{ Params: { id: string } }>('/alerts/local/:id', async (request, reply) => {
    const { id } = request.params;

    if (!alertManager.removeLocalAlert(id)) {
      throw new NotFoundError('Local alert', id);
    }

    return reply.code(204).send();
  });
}
