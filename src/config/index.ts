/**
 * Application Configuration
 */

import dotenv from 'dotenv';

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3000', 10),
  host: process.env.HOST || '0.0.0.0',
  env: process.env.NODE_ENV || 'development',

  // Printer controller
  printer: {
    ip: (process.env.PRINTER_IP || '').trim(),
    timeoutMs: parseNumber(process.env.PRINTER_TIMEOUT_MS, 5000),
  },

  // Log polling and housekeeping
  monitor: {
    pollLines: parseNumber(process.env.LOG_POLL_LINES, 200),
    pollIntervalMs: Math.max(1000, parseNumber(process.env.LOG_POLL_INTERVAL_MS, 5000)),
    cleanupIntervalMs: Math.max(1000, parseNumber(process.env.CLEANUP_INTERVAL_MS, 5 * 60 * 1000)),
    alertRetentionHours: parseNumber(process.env.ALERT_RETENTION_HOURS, 24),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: 60 * 1000, // 1 minute
    max: 1000, // requests per window
  },

  // CORS
  cors: {
    origin: process.env.CORS_ORIGIN?.split(',') || '*',
    credentials: true,
  },

  // Logging
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.NODE_ENV === 'development',
    silent: process.env.NODE_ENV === 'test',
  },

  // Pagination
  pagination: {
    defaultPageSize: 100,
    maxPageSize: 1000,
  },
} as const;

export type AppConfig = typeof config;
