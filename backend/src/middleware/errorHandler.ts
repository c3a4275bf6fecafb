import { Request, Response, NextFunction } from 'express';
import { AppError, GatewayTimeoutError, isOperationalError } from '../utils/errors';
import { logger, logError } from '../utils/logger';

// Error response interface
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: { stack: string[] };
    requestId?: string;
  };
}

// Async handler wrapper to catch errors in async route handlers
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

const formatErrorResponse = (error: AppError, requestId: string | undefined, isDev: boolean): ErrorResponse => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      requestId
    }
  };

  // Include stack trace in development
  if (isDev && error.stack) {
    response.error.details = {
      stack: error.stack.split('\n').slice(0, 5)
    };
  }

  return response;
};

// body-parser tags its errors with a `type` field
const isBodyParserError = (error: Error): error is Error & { type: string; status?: number } =>
  'type' in error && typeof error.type === 'string';

/**
 * Map any thrown value to an AppError
 */
export const toAppError = (error: Error, isDev: boolean): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      return new AppError('Request body is not valid JSON', 400, 'INVALID_JSON');
    }
    if (error.type === 'entity.too.large') {
      return new AppError('Request body is too large', 413, 'PAYLOAD_TOO_LARGE');
    }
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return new GatewayTimeoutError();
  }
  return new AppError(isDev ? error.message : 'An unexpected error occurred', 500, 'INTERNAL_ERROR');
};

// Global error handler middleware
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = req.requestId;
  const isDev = process.env.NODE_ENV !== 'production';

  logError(requestId, error, {
    method: req.method,
    path: req.path
  });

  if (!isOperationalError(error)) {
    logger.error('Programming error detected', {
      requestId,
      error: error.message,
      stack: error.stack
    });
  }

  const appError = toAppError(error, isDev);
  res.status(appError.statusCode).json(formatErrorResponse(appError, requestId, isDev));
};

// 404 handler for undefined routes
export const notFoundHandler = (req: Request, res: Response) => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      requestId: req.requestId
    }
  };
  res.status(404).json(response);
};

export default errorHandler;
