import helmet from 'helmet';
import cors from 'cors';
import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

/**
 * Helmet security headers. The API only serves JSON and the config script, so
 * the policy stays strict.
 */
export const helmetConfig = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      scriptSrc: ["'self'"],
      objectSrc: ["'none'"],
      frameAncestors: ["'self'"]
    }
  },
  // config.js is loaded by the overlay from another origin during development
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' }
});

export const corsConfig = (origins: string[]) =>
  cors({
    origin: origins,
    credentials: true
  });

/**
 * Reject bodies larger than the limit before they reach a route
 */
export const requestSizeValidator = (maxSizeBytes: number = 64 * 1024) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const contentLength = parseInt(req.headers['content-length'] || '0', 10);

    if (contentLength > maxSizeBytes) {
      logger.warn('Request too large', {
        requestId: req.requestId,
        contentLength,
        maxSize: maxSizeBytes,
        path: req.path
      });

      res.status(413).json({
        success: false,
        error: {
          code: 'REQUEST_TOO_LARGE',
          message: `Request body exceeds maximum size of ${Math.round(maxSizeBytes / 1024)}KB`,
          requestId: req.requestId
        }
      });
      return;
    }

    next();
  };
};
