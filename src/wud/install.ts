import type { RefreshCoordinator } from './coordinator';
import { TRIGGER_LABEL } from './types';
import { HTTPStatusError, WudRequestError } from './errors';
import { basicAuthHeader, withTimeout } from './http';
import { zone, errorMessage } from '../logging/zone';

const log = zone('wud.install');

// WUD replies only once the image is pulled and the container recreated
export const INSTALL_TIMEOUT_MS = 10 * 60_000;

export type InstallContext = Pick<RefreshCoordinator, 'url' | 'auth' | 'session' | 'getContainer'>;

/** `wud.trigger.hass` value "docker.local" becomes path "docker/local" */
export function triggerPath(triggerLabel: string): string {
    return triggerLabel.replaceAll('.', '/');
}

export function triggerEndpoint(containersUrl: string, containerId: string, triggerLabel: string): string {
    return `${containersUrl}/${containerId}/triggers/${triggerPath(triggerLabel)}`;
}

/**
 * Ask WUD to run the container's trigger. Fire-and-forget: every failure is
 * logged and the promise still resolves. No local state changes; the next
 * refresh shows the new version once WUD has applied it.
 */
export async function installUpdate(
    context: InstallContext,
    containerName: string,
    displayName: string = containerName,
    timeoutMs: number = INSTALL_TIMEOUT_MS
): Promise<void> {
    log.info({ message: 'Starting update for container', data: { container: displayName } });

    const record = context.getContainer(containerName);
    if (!record) {
        log.error({ message: 'Container data not found', data: { container: displayName } });
        return;
    }

    const triggerLabel = record.labels?.[TRIGGER_LABEL];
    if (!triggerLabel) {
        log.error({ message: 'Trigger label not found', data: { container: displayName, label: TRIGGER_LABEL } });
        return;
    }

    if (!record.id) {
        log.error({ message: 'No container id', data: { container: displayName } });
        return;
    }

    const endpoint = triggerEndpoint(context.url, record.id, triggerLabel);
    log.debug({ message: 'Sending update request to WUD trigger endpoint', data: { endpoint } });

    try {
        await withTimeout(endpoint, timeoutMs, async (signal) => {
            const response = await context.session(endpoint, {
                method: 'POST',
                headers: { Authorization: basicAuthHeader(context.auth) },
                signal
            });
            const text = await response.text();
            if (response.status !== 200) {
                throw new HTTPStatusError(endpoint, response.status, text);
            }
        });
        log.info({ message: 'Update has been triggered successfully', data: { container: displayName } });
    } catch (err) {
        if (err instanceof HTTPStatusError) {
            log.error({
                message: 'Failed to trigger update for container',
                data: { container: displayName, status: err.status, response: err.body }
            });
        } else if (err instanceof WudRequestError) {
            log.error({ message: 'Error communicating with WUD API', data: { container: displayName, error: errorMessage(err) } });
        } else {
            log.error({ message: 'Unexpected error during update', data: { container: displayName, error: errorMessage(err) } });
        }
    }
}
