import type { RefreshCoordinator } from './coordinator';
import type { ContainerRecord, EntityFeature, EntityState } from './types';
import { installedVersion, latestVersion, releaseUrl } from './projection';
import { fetchReleaseNotes, RELEASE_NOTES_TIMEOUT_MS } from './releaseNotes';
import { installUpdate, INSTALL_TIMEOUT_MS } from './install';

export const ENTITY_ICON = 'mdi:docker';
export const ENTITY_PICTURE = 'https://raw.githubusercontent.com/getwud/wud/main/docs/assets/wud-logo.svg';
export const SUPPORTED_FEATURES: readonly EntityFeature[] = ['install', 'release_notes'];

export interface UpdateEntityOptions {
    releaseNotesTimeoutMs?: number;
    installTimeoutMs?: number;
}

export type StateWriter = (state: EntityState) => void;

/**
 * Update entity for one container of one WUD instance.
 *
 * Holds only its key; every field is derived from the coordinator's current
 * snapshot when read, so a refresh is visible without copying anything.
 */
export class UpdateEntity {
    readonly entityId: string;
    readonly name: string;

    private readonly releaseNotesTimeoutMs: number;
    private readonly installTimeoutMs: number;
    private detach?: () => void;

    constructor(
        readonly coordinator: RefreshCoordinator,
        readonly containerName: string,
        options: UpdateEntityOptions = {}
    ) {
        this.entityId = `${coordinator.instanceId}_${containerName}`;
        this.name = `${containerName} (${coordinator.instanceName})`;
        this.releaseNotesTimeoutMs = options.releaseNotesTimeoutMs ?? RELEASE_NOTES_TIMEOUT_MS;
        this.installTimeoutMs = options.installTimeoutMs ?? INSTALL_TIMEOUT_MS;
    }

    get record(): ContainerRecord | undefined {
        return this.coordinator.getContainer(this.containerName);
    }

    get available(): boolean {
        return this.coordinator.lastUpdateSuccess;
    }

    get installedVersion(): string | undefined {
        return installedVersion(this.record);
    }

    get latestVersion(): string | undefined {
        return latestVersion(this.record);
    }

    get releaseUrl(): string | undefined {
        return releaseUrl(this.record);
    }

    // WUD exposes no progress for a running trigger
    get inProgress(): boolean {
        return false;
    }

    get updateAvailable(): boolean {
        return this.record?.updateAvailable === true;
    }

    async releaseNotes(): Promise<string | undefined> {
        if (!this.record) return undefined;

        return fetchReleaseNotes(this.releaseUrl, {
            session: this.coordinator.session,
            githubToken: this.coordinator.githubToken,
            timeoutMs: this.releaseNotesTimeoutMs
        });
    }

    async install(): Promise<void> {
        await installUpdate(this.coordinator, this.containerName, this.name, this.installTimeoutMs);
    }

    toState(): EntityState {
        return {
            entityId: this.entityId,
            name: this.name,
            containerName: this.containerName,
            instanceName: this.coordinator.instanceName,
            icon: ENTITY_ICON,
            entityPicture: ENTITY_PICTURE,
            deviceClass: 'firmware',
            supportedFeatures: [...SUPPORTED_FEATURES],
            available: this.available,
            installedVersion: this.installedVersion ?? null,
            latestVersion: this.latestVersion ?? null,
            releaseUrl: this.releaseUrl ?? null,
            inProgress: this.inProgress,
            updateAvailable: this.updateAvailable
        };
    }

    /**
     * Start pushing state to `write` after every successful refresh.
     * Calling attach again replaces the previous writer.
     */
    attach(write: StateWriter): void {
        this.detach?.();
        this.detach = this.coordinator.subscribe(() => write(this.toState()));
    }

    remove(): void {
        this.detach?.();
        this.detach = undefined;
    }
}
