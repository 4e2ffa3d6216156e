import type { ZodError } from 'zod';
import type { BasicAuth, ContainerRecord, HttpSession, WudInstanceConfig } from './types';
import { containerListSchema, containerRecordSchema } from './types';
import { DataError, HTTPStatusError, WudRequestError } from './errors';
import { basicAuthHeader, defaultSession, withTimeout } from './http';
import { zone, errorMessage } from '../logging/zone';

const log = zone('wud.fetcher');

export const FETCH_TIMEOUT_MS = 5_000;
export const PROBE_TIMEOUT_MS = 10_000;

export function containersUrl(instance: Pick<WudInstanceConfig, 'protocol' | 'host' | 'port'>): string {
    return `${instance.protocol}://${instance.host}:${instance.port}/api/containers`;
}

function describeIssue(error: ZodError): string {
    const issue = error.issues[0];
    return issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid payload';
}

/**
 * GET the container list and validate its shape.
 * Throws ConnectError, TimeoutError, HTTPStatusError or DataError.
 */
export async function fetchContainers(
    url: string,
    auth: BasicAuth,
    session: HttpSession = defaultSession,
    timeoutMs: number = FETCH_TIMEOUT_MS
): Promise<ContainerRecord[]> {
    return withTimeout(url, timeoutMs, async (signal) => {
        const response = await session(url, {
            method: 'GET',
            headers: { Authorization: basicAuthHeader(auth), Accept: 'application/json' },
            signal
        });

        if (!response.ok) {
            throw new HTTPStatusError(url, response.status);
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch (err) {
            throw new DataError(`Response is not JSON: ${errorMessage(err)}`, url, { cause: err });
        }

        const parsed = containerListSchema.safeParse(payload);
        if (!parsed.success) {
            throw new DataError(`Unexpected container list (${describeIssue(parsed.error)})`, url);
        }
        return readRecords(parsed.data, url);
    });
}

/**
 * Validate each entry on its own. An entry without a usable name is logged
 * and skipped; the rest of the list is kept.
 */
export function readRecords(entries: readonly unknown[], url: string): ContainerRecord[] {
    const records: ContainerRecord[] = [];
    entries.forEach((entry, index) => {
        const parsed = containerRecordSchema.safeParse(entry);
        if (parsed.success) {
            records.push(parsed.data);
            return;
        }
        log.warn({
            message: 'Skipping unreadable container record',
            data: { url, index, issue: describeIssue(parsed.error) }
        });
    });
    return records;
}

/**
 * Map records by container name. Later duplicates replace earlier ones.
 */
export function buildSnapshot(records: readonly ContainerRecord[]): Map<string, ContainerRecord> {
    const snapshot = new Map<string, ContainerRecord>();
    for (const record of records) {
        snapshot.set(record.name, record);
    }
    return snapshot;
}

export type ConnectionCheck =
    | { ok: true }
    | { ok: false; reason: 'cannot_connect' | 'unknown' };

/**
 * Connectivity probe run before an instance is accepted.
 * Anything other than a 200 from the containers endpoint rejects it.
 */
export async function validateConnection(
    instance: WudInstanceConfig,
    session: HttpSession = defaultSession,
    timeoutMs: number = PROBE_TIMEOUT_MS
): Promise<ConnectionCheck> {
    const url = containersUrl(instance);
    try {
        const status = await withTimeout(url, timeoutMs, async (signal) => {
            const response = await session(url, {
                method: 'GET',
                headers: { Authorization: basicAuthHeader(instance) },
                signal
            });
            // Release the connection; only the status matters here
            await response.body?.cancel();
            return response.status;
        });

        if (status !== 200) {
            log.error({ message: 'WUD connectivity check failed', data: { instance: instance.name, url, status } });
            return { ok: false, reason: 'cannot_connect' };
        }
        return { ok: true };
    } catch (err) {
        if (err instanceof WudRequestError) {
            log.error({ message: 'Client error connecting to WUD', data: { instance: instance.name, url, error: errorMessage(err) } });
            return { ok: false, reason: 'cannot_connect' };
        }
        log.error({ message: 'Unexpected error connecting to WUD', data: { instance: instance.name, url, error: errorMessage(err) } });
        return { ok: false, reason: 'unknown' };
    }
}
