import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { zone, errorMessage } from '../../logging/zone';

const log = zone('api:validation');

export const MAX_PARAM_LENGTH = 128;
export const MAX_BODY_BYTES = 10 * 1024;

const queryValueSchema = z.union([
    z.string().max(MAX_PARAM_LENGTH),
    z.array(z.string().max(MAX_PARAM_LENGTH))
]);

const querySchema = z.record(queryValueSchema);

// Entity ids are "<instance>_<host>_<container>"; instance names are free text
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const entityIdSchema = z.string().min(1).max(255).refine(id => !CONTROL_CHARS.test(id), 'Contains control characters');

/**
 * Only plain strings (or arrays of them) up to 128 characters are accepted
 * as query parameters.
 */
export function validateQuery(req: Request, res: Response, next: NextFunction): void {
    const result = querySchema.safeParse(req.query);
    if (!result.success) {
        log.warn({
            message: 'Query validation failed',
            data: { error: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
        });
        res.status(400).json({ error: 'Bad request: invalid parameters' });
        return;
    }
    next();
}

export function validateEntityId(req: Request, res: Response, next: NextFunction): void {
    const result = entityIdSchema.safeParse(req.params.entityId);
    if (!result.success) {
        log.warn({ message: 'Invalid entity id', data: { error: errorMessage(result.error) } });
        res.status(400).json({ error: 'Bad request: invalid entity id' });
        return;
    }
    next();
}

export function validateBodySize(req: Request, res: Response, next: NextFunction): void {
    const contentLength = req.headers['content-length'];
    if (contentLength) {
        const size = parseInt(contentLength, 10);
        if (size > MAX_BODY_BYTES) {
            log.warn({ message: 'Request body too large', data: { size, maxSize: MAX_BODY_BYTES } });
            res.status(413).json({ error: 'Request body too large' });
            return;
        }
    }
    next();
}
