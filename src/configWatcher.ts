import fs from 'fs';
import { loadConfigFile, getDefaultConfigFile } from './config';
import type { WudUpdatesConfig } from './config';
import { zone, errorMessage } from './logging/zone';

const log = zone('config-watcher');

/** Delay before reading a changed file or re-attaching after a rename */
export const SETTLE_DELAY_MS = 100;

/**
 * Called with the new configuration once a change has been validated.
 * Expected to tear down the running instances and set them up again.
 */
export type OnConfigChangeCallback = (newConfig: WudUpdatesConfig) => Promise<void>;

let watcher: fs.FSWatcher | null = null;
let watchedPath: string | null = null;
let onConfigChange: OnConfigChangeCallback | null = null;

/** Set while a reload is running so bursts of events trigger one reload */
let isReloading = false;

export function startWatchingConfigFile(callback: OnConfigChangeCallback, path: string = getDefaultConfigFile()): void {
    stopWatchingConfigFile();
    onConfigChange = callback;
    watchedPath = path;
    attachConfigWatcher(path);
}

export function stopWatchingConfigFile(): void {
    if (watcher) {
        watcher.close();
        watcher = null;
        log.debug({ message: 'Stopped watching config file' });
    }
    watchedPath = null;
    onConfigChange = null;
    isReloading = false;
}

export function isWatchingConfigFile(): boolean {
    return watcher !== null;
}

async function reload(configPath: string): Promise<void> {
    isReloading = true;
    await new Promise(resolve => setTimeout(resolve, SETTLE_DELAY_MS));

    try {
        const newConfig = await loadConfigFile(configPath);
        log.info({ message: 'Config file changed - reloading', data: { configPath } });
        if (onConfigChange) {
            await onConfigChange(newConfig);
        }
    } catch (err) {
        // Keep running with the previous configuration
        log.error({
            message: 'Failed to process config file change',
            data: { configPath, error: errorMessage(err) }
        });
    } finally {
        isReloading = false;
    }
}

function attachConfigWatcher(configPath: string): void {
    const current = fs.watch(configPath, (eventType) => {
        if (isReloading || current !== watcher) return;

        log.debug({ message: 'Config file watcher event', data: { eventType, configPath } });

        // Atomic writes replace the inode, so the old watcher goes stale
        if (eventType === 'rename') {
            current.close();
            watcher = null;
            setTimeout(() => {
                if (watcher !== null || watchedPath !== configPath) return;
                try {
                    attachConfigWatcher(configPath);
                } catch (err) {
                    log.error({ message: 'Cannot re-attach config file watcher', data: { configPath, error: errorMessage(err) } });
                    return;
                }
                void reload(configPath);
            }, SETTLE_DELAY_MS);
            return;
        }

        void reload(configPath);
    });

    current.on('error', (err) => {
        log.error({ message: 'Config file watcher error', data: { configPath, error: errorMessage(err) } });
    });

    watcher = current;
    log.debug({ message: 'Watching config file for changes', data: { path: configPath } });
}
