export { requestLogging } from './logging';
export { createRateLimiter } from './ratelimit';
export { createAuthMiddleware } from './auth';
export { errorHandler, notFoundHandler } from './errorHandler';
export { validateQuery, validateBodySize, validateEntityId } from './validation';
