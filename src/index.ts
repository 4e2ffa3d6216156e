import { loadConfigFile, getDefaultConfigFile } from './config';
import type { WudUpdatesConfig } from './config';
import { EntityRegistry } from './entityRegistry';
import { setupInstances } from './setup';
import type { InstanceHandle, SetupOptions } from './setup';
import { startAPI, stopAPI } from './api/server';
import { startWatchingConfigFile, stopWatchingConfigFile } from './configWatcher';
import { zone } from './logging/zone';

const log = zone('index');

export * from './wud';
export { EntityRegistry } from './entityRegistry';
export { setupInstance, setupInstances } from './setup';
export { loadConfigFile, validateConfig } from './config';
export type { InstanceConfig, APIConfig, WudUpdatesConfig, WudUpdatesConfigInput } from './config';

export interface StartOptions extends SetupOptions {
    /** Watch the config file and reload on change (default: true when loading from file) */
    watchConfig?: boolean;
    configPath?: string;
}

export interface AppState {
    config: WudUpdatesConfig;
    registry: EntityRegistry;
    instances: InstanceHandle[];
    apiPort?: number;
}

let current: AppState | null = null;

export function getAppState(): AppState | null {
    return current;
}

/**
 * Load configuration, set up every reachable WUD instance and start the API.
 * Throws when the configuration is invalid or the API cannot listen.
 */
export async function startApp(config?: WudUpdatesConfig, options: StartOptions = {}): Promise<AppState> {
    if (current) {
        await stopApp();
    }

    const configPath = options.configPath ?? getDefaultConfigFile();
    const cfg = config ?? await loadConfigFile(configPath);
    const registry = new EntityRegistry();

    const instances = await setupInstances(cfg.instances, registry, {
        ...options,
        updateIntervalMs: options.updateIntervalMs ?? cfg.updateInterval
    });

    const state: AppState = { config: cfg, registry, instances };
    current = state;

    if (cfg.api?.enabled === true) {
        try {
            state.apiPort = await startAPI(cfg.api, {
                registry,
                coordinators: () => state.instances.map(handle => handle.coordinator)
            });
        } catch (err) {
            teardown();
            throw err;
        }
    }

    log.info({
        message: 'Initialization complete',
        data: { instances: instances.length, entities: registry.getAll().length }
    });

    const watch = options.watchConfig ?? config === undefined;
    if (watch) {
        startWatchingConfigFile(newConfig => handleConfigChange(newConfig, options), configPath);
    }

    return state;
}

/**
 * Reload with a changed configuration. Watching carries over as is.
 */
async function handleConfigChange(newConfig: WudUpdatesConfig, options: StartOptions): Promise<void> {
    log.debug({ message: 'Config file changed - restarting instances' });
    teardown();
    await startApp(newConfig, { ...options, watchConfig: false });
}

function teardown(): void {
    if (!current) return;
    for (const handle of current.instances) {
        handle.unload();
    }
    current.registry.clear();
    current.registry.removeAllListeners();
    stopAPI();
    current = null;
}

export async function stopApp(): Promise<void> {
    stopWatchingConfigFile();
    teardown();
}
