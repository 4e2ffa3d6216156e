import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

/**
 * Global limiter: every client shares one budget of `requestsPerSecond`.
 * Rates below one request per second widen the window instead.
 */
export function createRateLimiter(requestsPerSecond: number): RateLimitRequestHandler {
    const perWindow = Math.max(1, Math.round(requestsPerSecond));
    const windowMs = Math.round((1000 * perWindow) / requestsPerSecond);

    return rateLimit({
        windowMs,
        limit: perWindow,
        statusCode: 429,
        standardHeaders: true,
        legacyHeaders: false,
        keyGenerator: () => 'global',
        message: { error: 'Too many requests' }
    });
}
