// Base application error class
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.status = statusCode.toString().startsWith('4') ? 'fail' : 'error';
    this.isOperational = true;
    this.code = code || 'UNKNOWN_ERROR';

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// 400 - Bad Request
export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed') {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

// 401 - Unauthorized
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized access') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

// 404 - Not Found
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

// 429 - Rate Limit
export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests. Please try again later.') {
    super(message, 429, 'RATE_LIMIT_EXCEEDED');
  }
}

// 500 - Internal Server Error
export class InternalError extends AppError {
  constructor(message: string = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
  }
}

// 502 - an upstream service (SIPADU, QA service) failed or answered garbage
export class UpstreamError extends AppError {
  public readonly upstream: string;

  constructor(upstream: string, message: string = 'Upstream service error', code: string = 'UPSTREAM_ERROR') {
    super(message, 502, code);
    this.upstream = upstream;
  }
}

// 503 - Service Unavailable
export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
  }
}

// 504 - upstream did not answer in time
export class GatewayTimeoutError extends AppError {
  constructor(message: string = 'Upstream service timed out') {
    super(message, 504, 'GATEWAY_TIMEOUT');
  }
}

// Helper to check if error is operational (expected) vs programming error
export const isOperationalError = (error: Error): boolean => {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
