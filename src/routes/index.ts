/**
 * Routes Index - Central route registration
 */

import { FastifyInstance } from 'fastify';
import type { AlertManager, LogGrouper } from '../core';
import type { LogMonitor } from '../services/log-monitor.service';
import { alertsRoutes } from './alerts.routes';
import { healthRoutes } from './health.routes';
import { logsRoutes } from './logs.routes';

export type RouteDependencies = {
  logGrouper: LogGrouper;
  alertManager: AlertManager;
  monitor: LogMonitor;
};

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  // Register all API routes under /api/v1 prefix
  await fastify.register(
    async (api) => {
      await api.register(logsRoutes, deps);
      await api.register(alertsRoutes, deps);
    },
    { prefix: '/api/v1' }
  );

  // Register health routes (no prefix)
  await fastify.register(healthRoutes, deps);
}
