import { Request, Response, NextFunction } from 'express';
import { zone } from '../../logging/zone';
import { getClientIP } from './utils';

const log = zone('api:request');

/**
 * Log each request once its response has been sent.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();
    const clientIp = getClientIP(req);

    res.on('finish', () => {
        log.debug({
            message: 'API request',
            data: {
                method: req.method,
                path: req.path,
                ip: clientIp,
                statusCode: res.statusCode,
                duration: `${Date.now() - startTime}ms`
            }
        });
    });

    next();
}
