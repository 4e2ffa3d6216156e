import EventEmitter from 'events';
import type { BasicAuth, ContainerRecord, HttpSession, RefreshSnapshot, WudInstanceConfig } from './types';
import { SetupError } from './errors';
import { defaultSession } from './http';
import { buildSnapshot, containersUrl, fetchContainers, FETCH_TIMEOUT_MS } from './fetcher';
import { zone, errorMessage } from '../logging/zone';

const log = zone('wud.coordinator');

export const DEFAULT_UPDATE_INTERVAL_MS = 5_000;

export interface CoordinatorOptions {
    session?: HttpSession;
    updateIntervalMs?: number;
    fetchTimeoutMs?: number;
}

export type RefreshListener = (snapshot: RefreshSnapshot) => void;

/**
 * Polls one WUD instance and holds the latest container snapshot.
 *
 * The snapshot is swapped in a single assignment after a successful fetch,
 * and subscribers are notified synchronously right after. A failed refresh
 * keeps the previous snapshot and only flips `lastUpdateSuccess`.
 *
 * Events: 'refreshed' (snapshot) and 'failed' (error).
 */
export class RefreshCoordinator extends EventEmitter {
    readonly instanceId: string;
    readonly instanceName: string;
    readonly url: string;
    readonly auth: Readonly<BasicAuth>;
    readonly githubToken: string | undefined;
    readonly session: HttpSession;
    readonly updateIntervalMs: number;

    private readonly fetchTimeoutMs: number;
    private snapshot: RefreshSnapshot = new Map<string, ContainerRecord>();
    private success = false;
    private successTime?: Date;
    private error?: unknown;
    private timer?: NodeJS.Timeout;
    private refreshInProgress = false;

    constructor(instance: WudInstanceConfig, options: CoordinatorOptions = {}) {
        super();
        this.instanceId = `${instance.name}_${instance.host}`;
        this.instanceName = instance.name;
        this.url = containersUrl(instance);
        this.auth = Object.freeze({ username: instance.username, password: instance.password });
        this.githubToken = instance.token || undefined;
        this.session = options.session ?? defaultSession;
        this.updateIntervalMs = options.updateIntervalMs ?? DEFAULT_UPDATE_INTERVAL_MS;
        this.fetchTimeoutMs = options.fetchTimeoutMs ?? FETCH_TIMEOUT_MS;
    }

    get data(): RefreshSnapshot {
        return this.snapshot;
    }

    get lastUpdateSuccess(): boolean {
        return this.success;
    }

    get lastUpdateSuccessTime(): Date | undefined {
        return this.successTime;
    }

    get lastError(): unknown {
        return this.error;
    }

    get isPolling(): boolean {
        return this.timer !== undefined;
    }

    getContainer(name: string): ContainerRecord | undefined {
        return this.snapshot.get(name);
    }

    /**
     * Register a listener for successful refreshes. A throwing listener is
     * logged and does not prevent the others from running.
     */
    subscribe(listener: RefreshListener): () => void {
        const wrapped = (snapshot: RefreshSnapshot) => {
            try {
                listener(snapshot);
            } catch (err) {
                log.error({
                    message: 'Refresh listener failed',
                    data: { instance: this.instanceName, error: errorMessage(err) }
                });
            }
        };
        this.on('refreshed', wrapped);
        return () => {
            this.off('refreshed', wrapped);
        };
    }

    /**
     * Fetch once. Resolves to whether the refresh succeeded; never rejects.
     */
    async refresh(): Promise<boolean> {
        let records: ContainerRecord[];
        try {
            records = await fetchContainers(this.url, this.auth, this.session, this.fetchTimeoutMs);
        } catch (err) {
            this.success = false;
            this.error = err;
            log.error({
                message: 'Error fetching data from WUD',
                data: {
                    instance: this.instanceName,
                    type: err instanceof Error ? err.name : typeof err,
                    error: errorMessage(err)
                }
            });
            this.emit('failed', err);
            return false;
        }

        this.snapshot = buildSnapshot(records);
        this.success = true;
        this.successTime = new Date();
        this.error = undefined;

        log.debug({
            message: 'Fetched data from WUD',
            data: { instance: this.instanceName, containers: this.snapshot.size }
        });

        this.emit('refreshed', this.snapshot);
        return true;
    }

    /**
     * Refresh eagerly during setup. Throws SetupError when WUD cannot be read,
     * since no entities can be enumerated without a first snapshot.
     */
    async firstRefresh(): Promise<void> {
        const ok = await this.refresh();
        if (!ok) {
            throw new SetupError(this.instanceName, { cause: this.error });
        }
    }

    start(): void {
        if (this.timer) {
            log.warn({ message: 'Coordinator is already polling', data: { instance: this.instanceName } });
            return;
        }

        this.timer = setInterval(() => {
            void this.tick();
        }, this.updateIntervalMs);

        log.debug({
            message: 'Started polling WUD',
            data: { instance: this.instanceName, intervalMs: this.updateIntervalMs }
        });
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = undefined;
        log.debug({ message: 'Stopped polling WUD', data: { instance: this.instanceName } });
    }

    private async tick(): Promise<void> {
        if (this.refreshInProgress) {
            log.debug({ message: 'Previous refresh still running, skipping tick', data: { instance: this.instanceName } });
            return;
        }

        this.refreshInProgress = true;
        try {
            await this.refresh();
        } finally {
            this.refreshInProgress = false;
        }
    }
}
