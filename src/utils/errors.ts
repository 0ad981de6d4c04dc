/**
 * API error hierarchy and the JSON envelope every error response uses
 */

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
    timestamp: string;
  };
}

export function errorEnvelope(code: string, message: string, details?: unknown): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      timestamp: new Date().toISOString(),
    },
  };
}

export class APIError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'APIError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): ErrorEnvelope {
    return errorEnvelope(this.code, this.message, this.details);
  }
}

export class NotFoundError extends APIError {
  constructor(resource: string, identifier: string) {
    super(404, 'RESOURCE_NOT_FOUND', `${resource} '${identifier}' not found`);
  }
}

export class ValidationError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class InternalServerError extends APIError {
  constructor(message = 'An unexpected error occurred', details?: Record<string, unknown>) {
    super(500, 'INTERNAL_ERROR', message, details);
  }
}

/**
 * An upstream dependency (the printer controller) could not be reached or
 * answered with something unusable
 */
export class ServiceUnavailableError extends APIError {
  constructor(service: string, reason?: string) {
    super(503, 'SERVICE_UNAVAILABLE', `${service} is unavailable${reason ? `: ${reason}` : ''}`, {
      service,
    });
  }
}
