/**
 * Middleware index: re-exports all middleware modules.
 */
export { createHelmetMiddleware, createCorsMiddleware, createInputSanitizer, createRequestIdMiddleware, getRequestId } from './security.js';
export { createRateLimitMiddleware, HttpRateLimiter, type RateLimitMiddleware } from './rateLimiter.js';
export { createRequestLogger } from './requestLogger.js';
export { createErrorHandler, createNotFoundHandler } from './errorHandler.js';
