import { ZodError } from 'zod';

export class ApiError extends Error {
  status: number;
  details?: unknown;

  constructor(message: string, status: number = 500, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.details = details;

    // Set the prototype explicitly to ensure instanceof works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      ...(this.details !== undefined ? { details: this.details } : {})
    };
  }
}

/** Malformed or out-of-range input (negative carbs, non-positive BG/ISF/ICR, bad dates). */
export class InvalidInputError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, details);
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string = 'Not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** No history available to derive a value the caller explicitly asked for. */
export class InsufficientDataError extends ApiError {
  constructor(message: string) {
    super(message, 422);
    this.name = 'InsufficientDataError';
  }
}

export type UpstreamService = 'store' | 'inference';

export class UpstreamUnavailableError extends ApiError {
  service: UpstreamService;

  constructor(service: UpstreamService, message: string, details?: unknown) {
    super(message, 503, details);
    this.name = 'UpstreamUnavailableError';
    this.service = service;
  }
}

export function handleApiError(error: unknown): { status: number; message: string; details?: unknown } {
  if (error instanceof ApiError) {
    if (error.status >= 500) console.error('API Error:', error);
    return {
      status: error.status,
      message: error.message,
      ...(error.details !== undefined ? { details: error.details } : {})
    };
  }

  console.error('API Error:', error);

  if (error instanceof Error) {
    return {
      status: 500,
      message: error.message || 'An unexpected error occurred',
      details: process.env.NODE_ENV === 'development' ? error.stack : undefined
    };
  }

  return {
    status: 500,
    message: 'An unknown error occurred',
    details: error
  };
}

export function validateWithZod<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data);
  } catch (error) {
    throw new InvalidInputError(describeValidationError(error), error);
  }
}

function describeValidationError(error: unknown): string {
  if (error instanceof ZodError && error.issues.length > 0) {
    const [issue] = error.issues;
    const path = issue.path.join('.');
    return path ? `Validation failed: ${path}: ${issue.message}` : `Validation failed: ${issue.message}`;
  }
  return 'Validation failed';
}
