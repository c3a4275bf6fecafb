import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { Request } from 'express';
import { logger } from '../utils/logger';

export interface RateLimitSettings {
  windowMs: number;
  max: number;
}

// Rate limit response format
const createRateLimitResponse = (code: string, message: string) => ({
  success: false,
  error: {
    code,
    message
  }
});

// Prefer the first X-Forwarded-For hop when running behind the SIPADU proxy
export const keyGenerator = (req: Request): string => {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const forwardedIp = Array.isArray(forwarded) ? forwarded[0] : forwarded.split(',')[0];
    return forwardedIp.trim();
  }
  return req.ip || req.socket?.remoteAddress || 'unknown';
};

/**
 * General API rate limiter; health checks are never limited
 */
export const createApiLimiter = ({ windowMs, max }: RateLimitSettings): RateLimitRequestHandler =>
  rateLimit({
    windowMs,
    limit: max,
    message: createRateLimitResponse(
      'RATE_LIMIT_EXCEEDED',
      'Too many requests. Please try again in a few minutes.'
    ),
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    handler: (req, res, _next, options) => {
      logger.warn('Rate limit reached', {
        ip: keyGenerator(req),
        path: req.path,
        method: req.method,
        requestId: req.requestId
      });
      res.status(options.statusCode).json(options.message);
    },
    skip: (req) => req.path.startsWith('/health')
  });

/**
 * Token validation hits the SIPADU API on every call, so it gets a tighter budget
 */
export const createSessionLimiter = ({ windowMs, max }: RateLimitSettings): RateLimitRequestHandler =>
  rateLimit({
    windowMs,
    limit: Math.max(1, Math.floor(max / 10)),
    message: createRateLimitResponse(
      'SESSION_RATE_LIMIT',
      'Too many session checks. Please wait a moment before reloading.'
    ),
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    handler: (req, res, _next, options) => {
      logger.warn('Session rate limit reached', {
        ip: keyGenerator(req),
        requestId: req.requestId
      });
      res.status(options.statusCode).json(options.message);
    }
  });
