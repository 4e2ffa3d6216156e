import { Request, Response, NextFunction, RequestHandler } from 'express';
import { zone } from '../../logging/zone';
import { getClientIP } from './utils';

const log = zone('api:auth');

function providedKey(req: Request): string | undefined {
    const header = req.headers['x-api-key'];
    if (typeof header === 'string') return header;
    return typeof req.query.key === 'string' ? req.query.key : undefined;
}

/**
 * Reject requests without the API key when one is configured.
 * The key is accepted from the X-API-Key header or the `key` query parameter.
 */
export function createAuthMiddleware(apiKey: string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!apiKey) {
            next();
            return;
        }

        const key = providedKey(req);
        if (!key) {
            log.warn({
                message: 'API request rejected: missing API key',
                data: { method: req.method, path: req.path, ip: getClientIP(req) }
            });
            res.status(401).json({ error: 'Unauthorized: missing API key' });
            return;
        }

        if (key !== apiKey) {
            log.warn({
                message: 'API request rejected: invalid API key',
                data: { method: req.method, path: req.path, ip: getClientIP(req) }
            });
            res.status(401).json({ error: 'Unauthorized: invalid API key' });
            return;
        }

        next();
    };
}
