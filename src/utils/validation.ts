/**
 * Request payload guards
 */

import type { JsonObject, JsonValue, LogType } from '../types';
import { ValidationError } from './errors';

const LOG_TYPES: ReadonlySet<string> = new Set(['info', 'warning', 'error']);

export function isLogType(value: unknown): value is LogType {
  return typeof value === 'string' && LOG_TYPES.has(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

export function assertObjectPayload(payload: unknown, label: string): JsonObject {
  if (!isJsonObject(payload)) {
    throw new ValidationError(`${label} must be a JSON object`);
  }
  return payload;
}

/**
 * Parse a `limit` query parameter
 */
export function parseLimit(value: string | undefined, fallback: number, max: number): number {
  if (value === undefined || value === '') return fallback;

  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > max) {
    throw new ValidationError(`limit must be an integer between 1 and ${max}`);
  }
  return limit;
}
