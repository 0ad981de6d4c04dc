/**
 * Health and Metrics Routes
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { MonitorState } from '../types';
import type { RouteDependencies } from './index';

// Track service start time for uptime calculation
const serviceStartTime = Date.now();

type PrinterStatus = 'disabled' | 'pending' | 'up' | 'down';

function printerStatus(state: MonitorState): PrinterStatus {
  if (!state.enabled) return 'disabled';
  if (state.last_error !== undefined) return 'down';
  return state.last_success_at ? 'up' : 'pending';
}

export async function healthRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  const { logGrouper, alertManager, monitor } = deps;

  // GET /healthz - Health check
  fastify.get('/healthz', async (request: FastifyRequest, reply: FastifyReply) => {
    const state = monitor.getState();
    const printer = printerStatus(state);

    return reply.code(200).send({
      status: printer === 'down' ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime_seconds: Math.floor((Date.now() - serviceStartTime) / 1000),
      components: {
        printer,
      },
      ...(state.last_error ? { error: state.last_error } : {}),
    });
  });

  // GET /metrics - Prometheus metrics (simple text format)
  fastify.get('/metrics', async (request: FastifyRequest, reply: FastifyReply) => {
    const logs = logGrouper.getStats();
    const alerts = alertManager.getStats();
    const state = monitor.getState();

    const metrics: string[] = [];

    metrics.push('# HELP printer_log_groups Number of retained pattern groups');
    metrics.push('# TYPE printer_log_groups gauge');
    metrics.push(`printer_log_groups ${logs.total_groups}`);
    metrics.push('');

    metrics.push('# HELP printer_log_buffered_entries Number of entries in the recent log buffer');
    metrics.push('# TYPE printer_log_buffered_entries gauge');
    metrics.push(`printer_log_buffered_entries ${logs.buffered_entries}`);
    metrics.push('');

    metrics.push('# HELP printer_log_lines_total Log lines accepted into pattern groups');
    metrics.push('# TYPE printer_log_lines_total counter');
    metrics.push(`printer_log_lines_total ${logs.total_lines}`);
    metrics.push('');

    metrics.push('# HELP printer_alerts_active Number of active alerts by origin');
    metrics.push('# TYPE printer_alerts_active gauge');
    metrics.push(`printer_alerts_active{origin="log"} ${alerts.active_alerts}`);
    metrics.push(`printer_alerts_active{origin="local"} ${alerts.local_alerts}`);
    metrics.push('');

    metrics.push('# HELP printer_alerts_history_entries Number of alert history records');
    metrics.push('# TYPE printer_alerts_history_entries gauge');
    metrics.push(`printer_alerts_history_entries ${alerts.history_entries}`);
    metrics.push('');

    metrics.push('# HELP printer_alerts_created_total Alerts created since start');
    metrics.push('# TYPE printer_alerts_created_total counter');
    metrics.push(`printer_alerts_created_total ${alerts.created_total}`);
    metrics.push('');

    metrics.push('# HELP printer_alerts_suppressed_total Alert candidates dropped as recently resolved');
    metrics.push('# TYPE printer_alerts_suppressed_total counter');
    metrics.push(`printer_alerts_suppressed_total ${alerts.suppressed_total}`);
    metrics.push('');

    metrics.push('# HELP printer_log_polls_total Printer log polls by outcome');
    metrics.push('# TYPE printer_log_polls_total counter');
    metrics.push(`printer_log_polls_total{outcome="success"} ${state.runs - state.failures}`);
    metrics.push(`printer_log_polls_total{outcome="failure"} ${state.failures}`);
    metrics.push('');

    // Service uptime
    metrics.push('# HELP printer_monitor_uptime_seconds Service uptime in seconds');
    metrics.push('# TYPE printer_monitor_uptime_seconds counter');
    metrics.push(`printer_monitor_uptime_seconds ${Math.floor((Date.now() - serviceStartTime) / 1000)}`);
    metrics.push('');

    return reply
      .code(200)
      .header('Content-Type', 'text/plain; version=0.0.4')
      .send(metrics.join('\n'));
  });
}
