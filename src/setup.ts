import type { EntityRegistry } from './entityRegistry';
import type { InstanceConfig } from './config';
import type { HttpSession } from './wud/types';
import { RefreshCoordinator } from './wud/coordinator';
import { UpdateEntity } from './wud/entity';
import type { UpdateEntityOptions } from './wud/entity';
import { validateConnection } from './wud/fetcher';
import { SetupError } from './wud/errors';
import { zone, errorMessage } from './logging/zone';

const log = zone('setup');

export interface SetupOptions extends UpdateEntityOptions {
    session?: HttpSession;
    updateIntervalMs?: number;
    fetchTimeoutMs?: number;
    probeTimeoutMs?: number;
}

export interface InstanceHandle {
    coordinator: RefreshCoordinator;
    entities: UpdateEntity[];
    unload: () => void;
}

/**
 * Bring one WUD instance up: refresh once, create one entity per container
 * in that first snapshot, register them and start polling.
 *
 * The entity set stays fixed afterwards; containers that show up later get
 * an entity on the next reload.
 */
export async function setupInstance(
    instance: InstanceConfig,
    registry: EntityRegistry,
    options: SetupOptions = {}
): Promise<InstanceHandle> {
    const coordinator = new RefreshCoordinator(instance, {
        session: options.session,
        updateIntervalMs: options.updateIntervalMs,
        fetchTimeoutMs: options.fetchTimeoutMs
    });

    await coordinator.firstRefresh();

    const entities = Array.from(coordinator.data.keys(), containerName =>
        new UpdateEntity(coordinator, containerName, {
            releaseNotesTimeoutMs: options.releaseNotesTimeoutMs,
            installTimeoutMs: options.installTimeoutMs
        })
    );
    registry.addAll(entities);
    coordinator.start();

    log.info({
        message: 'WUD instance set up',
        data: { instance: instance.name, url: coordinator.url, entities: entities.length }
    });

    return {
        coordinator,
        entities,
        unload: () => {
            coordinator.stop();
            registry.removeInstance(coordinator.instanceId);
            coordinator.removeAllListeners();
            log.debug({ message: 'WUD instance unloaded', data: { instance: instance.name } });
        }
    };
}

/**
 * Probe every configured instance and set up the ones that answer.
 * Rejected or failing instances are logged and skipped.
 */
export async function setupInstances(
    instances: readonly InstanceConfig[],
    registry: EntityRegistry,
    options: SetupOptions = {}
): Promise<InstanceHandle[]> {
    const handles: InstanceHandle[] = [];

    for (const instance of instances) {
        const check = await validateConnection(instance, options.session, options.probeTimeoutMs);
        if (!check.ok) {
            log.error({
                message: 'WUD instance rejected',
                data: { instance: instance.name, host: instance.host, reason: check.reason }
            });
            continue;
        }

        try {
            handles.push(await setupInstance(instance, registry, options));
        } catch (err) {
            if (!(err instanceof SetupError)) throw err;
            log.error({ message: err.message, data: { instance: instance.name, cause: errorMessage(err.cause) } });
        }
    }

    return handles;
}
