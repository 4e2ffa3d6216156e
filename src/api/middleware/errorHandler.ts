import { Request, Response, NextFunction } from 'express';
import { randomBytes } from 'crypto';
import { zone, errorMessage } from '../../logging/zone';

const log = zone('api:errors');

function generateErrorId(): string {
    return randomBytes(4).toString('hex');
}

interface ErrorResponse {
    error: string;
    errorId: string;
    code?: string;
}

function numericField(err: unknown, field: 'status' | 'statusCode'): number | undefined {
    if (typeof err !== 'object' || err === null || !(field in err)) return undefined;
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'number' && value >= 400 && value < 600 ? value : undefined;
}

function stringField(err: unknown, field: 'code' | 'type'): string | undefined {
    if (typeof err !== 'object' || err === null || !(field in err)) return undefined;
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'string' ? value : undefined;
}

/**
 * Global error handling middleware.
 * Logs the error under a random id and replies without internals.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
    const errorId = generateErrorId();
    const statusCode = numericField(err, 'statusCode') ?? numericField(err, 'status') ?? 500;

    log.error({
        message: 'API error',
        data: {
            errorId,
            type: err instanceof Error ? err.name : typeof err,
            message: errorMessage(err)
        }
    });

    const response: ErrorResponse = {
        error: 'An error occurred processing your request',
        errorId
    };

    // body-parser tags its errors with a `type`, e.g. "entity.parse.failed"
    const code = stringField(err, 'code') ?? stringField(err, 'type');
    if (code && statusCode < 500) {
        response.code = code;
    }

    res.status(statusCode).json(response);
}

export function notFoundHandler(_req: Request, res: Response): void {
    const errorId = generateErrorId();
    log.debug({ message: 'Route not found', data: { errorId } });

    res.status(404).json({
        error: 'Not found',
        errorId
    });
}
