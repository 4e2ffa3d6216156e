import { describe, it, expect, vi } from 'vitest';
import { UpdateEntity, ENTITY_PICTURE } from '../../../src/wud/entity';
import { RefreshCoordinator } from '../../../src/wud/coordinator';
import type { ContainerRecord, EntityState } from '../../../src/wud/types';
import {
    createMockContainer,
    createMockInstance,
    createMockSession,
    createOutdatedContainer,
    headerOf,
    jsonResponse,
    textResponse
} from '../../helpers/mockHelpers';

function setup(initial: ContainerRecord[], token = '') {
    let containers = initial;
    let failing = false;
    const session = createMockSession((url, init) => {
        if (url.startsWith('https://api.github.com/')) return jsonResponse({ body: `notes for ${url}` });
        if (init?.method === 'POST') return textResponse('OK');
        return failing ? textResponse('down', 503) : jsonResponse(containers);
    });
    const coordinator = new RefreshCoordinator(createMockInstance({ token }), { session });
    return {
        coordinator,
        session,
        setContainers: (next: ContainerRecord[]) => { containers = next; },
        setFailing: (value: boolean) => { failing = value; }
    };
}

describe('UpdateEntity', () => {
    it('derives its identity from the instance and container', () => {
        const { coordinator } = setup([]);
        const entity = new UpdateEntity(coordinator, 'nginx');

        expect(entity.entityId).toBe('home_wud.local_nginx');
        expect(entity.name).toBe('nginx (home)');
    });

    it('publishes the full state of an outdated container', async () => {
        const { coordinator } = setup([createOutdatedContainer()]);
        await coordinator.refresh();
        const entity = new UpdateEntity(coordinator, 'grafana');

        const expected: EntityState = {
            entityId: 'home_wud.local_grafana',
            name: 'grafana (home)',
            containerName: 'grafana',
            instanceName: 'home',
            icon: 'mdi:docker',
            entityPicture: ENTITY_PICTURE,
            deviceClass: 'firmware',
            supportedFeatures: ['install', 'release_notes'],
            available: true,
            installedVersion: 'v10.1.0',
            latestVersion: 'v10.2.0',
            releaseUrl: 'https://github.com/grafana/grafana/releases/tag/v10.2.0',
            inProgress: false,
            updateAvailable: true
        };
        expect(entity.toState()).toEqual(expected);
    });

    it('reads the current snapshot on every access', async () => {
        const { coordinator, setContainers } = setup([createMockContainer()]);
        await coordinator.refresh();
        const entity = new UpdateEntity(coordinator, 'nginx');
        expect(entity.installedVersion).toBe('1.25.3');

        setContainers([createMockContainer({ image: { tag: { value: '1.25.4' } } })]);
        await coordinator.refresh();

        expect(entity.installedVersion).toBe('1.25.4');
        expect(entity.latestVersion).toBe('1.25.4');
    });

    it('reports no data when its container leaves the snapshot', async () => {
        const { coordinator, setContainers } = setup([createMockContainer()]);
        await coordinator.refresh();
        const entity = new UpdateEntity(coordinator, 'nginx');

        setContainers([createOutdatedContainer()]);
        await coordinator.refresh();

        expect(entity.record).toBeUndefined();
        expect(entity.toState()).toMatchObject({
            available: true,
            installedVersion: null,
            latestVersion: null,
            releaseUrl: null,
            updateAvailable: false
        });
    });

    it('is unavailable while the last refresh failed, keeping its versions', async () => {
        const { coordinator, setFailing } = setup([createMockContainer()]);
        await coordinator.refresh();
        const entity = new UpdateEntity(coordinator, 'nginx');

        setFailing(true);
        await coordinator.refresh();

        expect(entity.available).toBe(false);
        expect(entity.installedVersion).toBe('1.25.3');
        expect(entity.inProgress).toBe(false);
    });

    describe('releaseNotes', () => {
        it('looks up notes through the coordinator session with its token', async () => {
            const { coordinator, session } = setup([createOutdatedContainer()], 'test-token');
            await coordinator.refresh();
            const entity = new UpdateEntity(coordinator, 'grafana');

            await expect(entity.releaseNotes()).resolves.toBe(
                'notes for https://api.github.com/repos/grafana/grafana/releases/tags/v10.2.0'
            );
            const [, init] = session.mock.calls[1];
            expect(headerOf(init, 'Authorization')).toBe('token test-token');
        });

        it('returns undefined without a record', async () => {
            const { coordinator, session } = setup([]);
            await coordinator.refresh();
            const entity = new UpdateEntity(coordinator, 'nginx');

            await expect(entity.releaseNotes()).resolves.toBeUndefined();
            expect(session).toHaveBeenCalledTimes(1);
        });
    });

    it('install fires the container trigger', async () => {
        const { coordinator, session } = setup([createMockContainer()]);
        await coordinator.refresh();
        const entity = new UpdateEntity(coordinator, 'nginx');

        await entity.install();

        expect(session).toHaveBeenLastCalledWith(
            'http://wud.local:3000/api/containers/c0ffee01/triggers/docker/local',
            expect.objectContaining({ method: 'POST' })
        );
    });

    describe('attach', () => {
        it('writes its state after each successful refresh until removed', async () => {
            const { coordinator } = setup([createMockContainer()]);
            const entity = new UpdateEntity(coordinator, 'nginx');
            const write = vi.fn();

            entity.attach(write);
            await coordinator.refresh();
            expect(write).toHaveBeenCalledTimes(1);
            expect(write).toHaveBeenCalledWith(expect.objectContaining({ entityId: 'home_wud.local_nginx', installedVersion: '1.25.3' }));

            entity.remove();
            await coordinator.refresh();
            expect(write).toHaveBeenCalledTimes(1);
        });

        it('replaces a previous writer', async () => {
            const { coordinator } = setup([createMockContainer()]);
            const entity = new UpdateEntity(coordinator, 'nginx');
            const first = vi.fn();
            const second = vi.fn();

            entity.attach(first);
            entity.attach(second);
            await coordinator.refresh();

            expect(first).not.toHaveBeenCalled();
            expect(second).toHaveBeenCalledTimes(1);
        });
    });
});
