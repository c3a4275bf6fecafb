export { errorHandler, asyncHandler, notFoundHandler } from './errorHandler';
export { requestLogger } from './requestLogger';
export { validateBody } from './validate';
export { createApiLimiter, createSessionLimiter } from './rateLimiter';
export { helmetConfig, corsConfig, requestSizeValidator } from './security';
