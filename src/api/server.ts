import express, { Express, NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import helmet from 'helmet';
import { zone } from '../logging/zone';
import type { APIConfig } from '../config';
import type { EntityRegistry } from '../entityRegistry';
import type { RefreshCoordinator } from '../wud/coordinator';
import {
    requestLogging,
    createRateLimiter,
    createAuthMiddleware,
    validateQuery,
    validateBodySize,
    validateEntityId,
    errorHandler,
    notFoundHandler
} from './middleware';

const log = zone('api');
export const API_VERSION = '1.0.0';
export const SERVICE_NAME = 'wud-updates';

export interface APIContext {
    registry: EntityRegistry;
    /** Coordinators of the instances currently set up */
    coordinators: () => readonly RefreshCoordinator[];
}

let server: Server | null = null;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
function asyncRoute(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export function createApp(apiConfig: APIConfig, context: APIContext): Express {
    const app = express();
    const { registry } = context;

    app.use(express.json({ limit: '10kb' }));
    app.use(validateBodySize);
    app.use(helmet({
        crossOriginResourcePolicy: { policy: 'same-origin' },
        crossOriginEmbedderPolicy: true,
        crossOriginOpenerPolicy: { policy: 'same-origin' }
    }));
    app.use(createRateLimiter(apiConfig.rateLimit));
    app.use(validateQuery);
    app.use(createAuthMiddleware(apiConfig.key));
    app.use(requestLogging);

    app.use((req, res, next) => {
        req.setTimeout(apiConfig.timeout);
        res.setTimeout(apiConfig.timeout);
        res.setHeader('X-API-Version', API_VERSION);
        next();
    });

    app.get('/', (_req, res) => {
        res.json({ message: SERVICE_NAME, version: API_VERSION });
    });

    app.get('/api/instances', (_req, res) => {
        const entities = registry.getAll();
        res.json(context.coordinators().map(coordinator => ({
            id: coordinator.instanceId,
            name: coordinator.instanceName,
            url: coordinator.url,
            lastUpdateSuccess: coordinator.lastUpdateSuccess,
            lastUpdateSuccessTime: coordinator.lastUpdateSuccessTime?.toISOString() ?? null,
            entities: entities.filter(entity => entity.coordinator === coordinator).length
        })));
    });

    app.get('/api/entities', (_req, res) => {
        res.json(registry.states());
    });

    app.get('/api/entities/:entityId', validateEntityId, (req, res, next) => {
        const entity = registry.get(req.params.entityId);
        if (!entity) {
            next();
            return;
        }
        res.json(entity.toState());
    });

    app.get('/api/entities/:entityId/release-notes', validateEntityId, asyncRoute(async (req, res) => {
        const entity = registry.get(req.params.entityId);
        if (!entity) {
            notFoundHandler(req, res);
            return;
        }
        const releaseNotes = await entity.releaseNotes();
        res.json({ entityId: entity.entityId, releaseNotes: releaseNotes ?? null });
    }));

    app.post('/api/entities/:entityId/install', validateEntityId, (req, res) => {
        const entity = registry.get(req.params.entityId);
        if (!entity) {
            notFoundHandler(req, res);
            return;
        }
        // The trigger may pull and recreate the container; its outcome is logged
        void entity.install();
        res.status(202).json({ entityId: entity.entityId, status: 'requested' });
    });

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * Start the HTTP API. Resolves with the bound port once listening.
 */
export async function startAPI(apiConfig: APIConfig, context: APIContext): Promise<number> {
    if (server) {
        stopAPI();
    }

    const app = createApp(apiConfig, context);

    try {
        return await new Promise<number>((resolve, reject) => {
            const listening = app.listen(apiConfig.port, '0.0.0.0', () => {
                const address = listening.address();
                const port = typeof address === 'object' && address !== null ? address.port : apiConfig.port;
                log.info({ message: 'API started', data: { port } });
                resolve(port);
            });
            listening.on('error', reject);
            server = listening;
        });
    } catch (err) {
        server = null;
        log.error({
            message: 'Failed to start API server',
            data: { port: apiConfig.port, error: err instanceof Error ? err.message : String(err) }
        });
        throw err;
    }
}

export function stopAPI(): void {
    if (server) {
        server.close();
        server.closeAllConnections();
        server = null;
        log.info({ message: 'API server stopped' });
    }
}
