import { describe, it, expect, vi } from 'vitest';

// Keep paths resolving to ./config/ whatever machine the tests run on
vi.mock('is-docker', () => ({
    default: () => false,
}));

import { getDefaultConfigFile, loadConfigFile, validateConfig } from '../../../src/config';
import { getConfigPath } from '../../helpers/mockHelpers';

describe('config', () => {
    it('defaults to ./config/wud-updates.yml outside Docker', () => {
        if (process.env.CONFIG_DIRECTORY) return;
        expect(getDefaultConfigFile()).toBe('./config/wud-updates.yml');
    });

    it('loads a file and applies defaults', async () => {
        const config = await loadConfigFile(getConfigPath('basic.yml'));

        expect(config.instances).toEqual([
            {
                name: 'home',
                protocol: 'http',
                host: 'wud.local',
                port: 3000,
                username: 'homeassistant',
                password: 'test-secret',
                token: ''
            },
            {
                name: 'lab',
                protocol: 'https',
                host: '10.0.0.20',
                port: 8443,
                username: 'monitor',
                password: 'test-secret',
                token: 'test-token'
            }
        ]);
        expect(config.updateInterval).toBe(10000);
        expect(config.api).toEqual({ enabled: true, port: 8080, rateLimit: 10, timeout: 15000 });
    });

    it('rejects an instance configured twice', async () => {
        await expect(loadConfigFile(getConfigPath('duplicate.yml')))
            .rejects.toThrow("instances.1: Instance 'home' on wud.local is already configured");
    });

    it('rejects an empty file', async () => {
        await expect(loadConfigFile(getConfigPath('empty.yml'))).rejects.toThrow('Invalid configuration');
    });

    it('names the file when it cannot be read', async () => {
        await expect(loadConfigFile(getConfigPath('missing.yml')))
            .rejects.toThrow(`Error loading config file at ${getConfigPath('missing.yml')}`);
    });

    it('defaults the update interval to five seconds', () => {
        const config = validateConfig({ instances: [{ name: 'home', host: 'wud.local' }] });
        expect(config.updateInterval).toBe(5000);
        expect(config.api).toBeUndefined();
    });

    it('lists every invalid field', () => {
        expect(() => validateConfig({
            instances: [{ name: '', host: 'wud.local', protocol: 'ftp', port: 70000 }],
            updateInterval: 10
        })).toThrow(/instances\.0\.name[\s\S]*instances\.0\.protocol[\s\S]*instances\.0\.port[\s\S]*updateInterval/);
    });

    it('requires at least one instance', () => {
        expect(() => validateConfig({ instances: [] })).toThrow('instances: Array must contain at least 1 element(s)');
    });
});
