/**
 * Application Logger
 */

import winston from 'winston';
import { config } from '../config';

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = component ? ` [${String(component)}]` : '';
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${scope}: ${String(message)}${rest}`;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  format: config.logging.pretty
    ? prettyFormat
    : winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
  defaultMeta: { service: 'printer-log-monitor' },
  transports: [new winston.transports.Console()],
});

export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
