import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { logger } from '../utils/logger';

/**
 * Validation error response format
 */
interface ValidationErrorResponse {
  success: false;
  error: {
    code: 'VALIDATION_ERROR';
    message: string;
    details: Array<{
      field: string;
      message: string;
    }>;
    requestId?: string;
  };
}

/**
 * Format Zod errors into user-friendly format
 */
export const formatZodErrors = (error: ZodError): Array<{ field: string; message: string }> => {
  return error.errors.map(err => ({
    field: err.path.join('.') || 'body',
    message: err.message
  }));
};

/**
 * Validate request body against a Zod schema, replacing it with the parsed value
 */
export const validateBody = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (result.success) {
      req.body = result.data;
      next();
      return;
    }

    const details = formatZodErrors(result.error);
    logger.warn('Validation error', {
      requestId: req.requestId,
      path: req.path,
      errors: details
    });

    const response: ValidationErrorResponse = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details,
        requestId: req.requestId
      }
    };
    res.status(400).json(response);
  };
};

export default validateBody;
