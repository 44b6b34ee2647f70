/**
 * Application errors
 *
 * Every error a service raises on purpose derives from AppError. The error
 * middleware renders them as `{ error, message, details? }` with the
 * carried status code.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly title: string;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode = 500, options: { title?: string; code?: string; details?: unknown } = {}) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.title = options.title ?? 'Internal Server Error';
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.details = options.details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, 400, { title: 'Validation Error', code, details });
    this.name = 'ValidationError';
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication credentials were not provided') {
    super(message, 401, { title: 'Authentication Error', code: 'UNAUTHENTICATED' });
    this.name = 'AuthError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, { title: 'Not Found', code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, { title: 'Conflict', code: 'CONFLICT' });
    this.name = 'ConflictError';
  }
}

/**
 * The AI provider could not produce a result: retries were exhausted, the
 * provider is not configured, or an explicit request could not fall back.
 */
export class AIServiceUnavailableError extends AppError {
  constructor(message = 'AI service is currently unavailable', details?: string) {
    super(message, 503, { title: 'AI Service Error', code: 'AI_SERVICE_UNAVAILABLE', details });
    this.name = 'AIServiceUnavailableError';
  }
}

const STATUS_TITLES: Record<number, string> = {
  400: 'Validation Error',
  401: 'Authentication Error',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  429: 'Too Many Requests',
  503: 'Service Unavailable',
};

export const createError = (message: string, statusCode = 500, details?: unknown): AppError =>
  new AppError(message, statusCode, { title: STATUS_TITLES[statusCode], details });

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
