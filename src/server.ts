/**
 * Main Server - Printer Log Monitor API
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';

import { config } from './config';
import { AlertManager, LogGrouper } from './core';
import { errorHandler } from './middleware/error.middleware';
import { loggingMiddleware } from './middleware/logging.middleware';
import { RouteDependencies, registerRoutes } from './routes';
import { LogMonitor } from './services/log-monitor.service';
import { PrinterClient } from './services/printer.service';
import { errorEnvelope } from './utils/errors';
import { logger } from './utils/logger';

const startTime = Date.now();

async function buildServer(deps: RouteDependencies) {
  const fastify = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
  });

  // Register plugins
  await fastify.register(cors, {
    origin: config.cors.origin,
    credentials: config.cors.credentials,
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
    errorResponseBuilder: () =>
      errorEnvelope('RATE_LIMIT_EXCEEDED', 'Rate limit exceeded. Please try again later.'),
  });

  // Swagger documentation
  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Printer Log Monitor API',
        description: 'Grouped printer controller logs and the alerts derived from them',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: 'Development server',
        },
      ],
    },
  });

  await fastify.register(swaggerUI, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  fastify.addHook('onResponse', loggingMiddleware);

  // Error handler
  fastify.setErrorHandler(errorHandler);

  // Register routes
  await registerRoutes(fastify, deps);

  // Root endpoint
  fastify.get('/', async (request, reply) => {
    return reply.send({
      service: 'Printer Log Monitor API',
      version: '1.0.0',
      status: 'running',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      endpoints: {
        docs: '/docs',
        health: '/healthz',
        api: '/api/v1',
      },
    });
  });

  return fastify;
}

/**
 * Composition root: the engines live here and are handed to routes
 */
function createDependencies(): RouteDependencies {
  const logGrouper = new LogGrouper();
  const alertManager = new AlertManager();
  const monitor = new LogMonitor({
    logGrouper,
    alertManager,
    source: config.printer.ip ? new PrinterClient(config.printer.ip, config.printer.timeoutMs) : undefined,
    pollLines: config.monitor.pollLines,
    pollIntervalMs: config.monitor.pollIntervalMs,
    cleanupIntervalMs: config.monitor.cleanupIntervalMs,
    alertRetentionHours: config.monitor.alertRetentionHours,
  });

  return { logGrouper, alertManager, monitor };
}

async function start() {
  try {
    const deps = createDependencies();

    // Build server
    const fastify = await buildServer(deps);

    // Start server
    await fastify.listen({
      port: config.port,
      host: config.host,
    });

    deps.monitor.start();

    logger.info('🚀 Printer Log Monitor API Server Started');
    logger.info(`📝 API Documentation: http://${config.host}:${config.port}/docs`);
    logger.info(`🏥 Health Check: http://${config.host}:${config.port}/healthz`);
    logger.info(`🌐 Environment: ${config.env}`);

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);

      try {
        deps.monitor.stop();
        await fastify.close();
        logger.info('✅ Server shut down successfully');
        process.exit(0);
      } catch (err) {
        logger.error('Error during shutdown:', err);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

export { buildServer, createDependencies, start };
