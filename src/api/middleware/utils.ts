import { Request } from 'express';

/**
 * Client IP, preferring the first X-Forwarded-For hop when behind a proxy.
 */
export function getClientIP(req: Request): string {
    const forwarded = req.headers['x-forwarded-for'];
    if (typeof forwarded === 'string') {
        return forwarded.split(',')[0].trim();
    }
    return req.socket.remoteAddress || 'unknown';
}
