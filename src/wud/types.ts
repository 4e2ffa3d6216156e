import { z } from 'zod';

/** Label naming the WUD trigger this service may fire for a container */
export const TRIGGER_LABEL = 'wud.trigger.hass';

/** Optional field that reads as absent when WUD sends null or another type */
function lenient<T extends z.ZodTypeAny>(schema: T) {
    return schema.optional().catch(undefined);
}

// Non-string label values are dropped one by one
const labelsSchema = z.record(z.unknown()).transform(labels => Object.fromEntries(
    Object.entries(labels).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
));

/**
 * One container as reported by `GET /api/containers`.
 * Only `name` is required; every other field read here is optional and
 * anything unmodelled passes through.
 */
export const containerRecordSchema = z.object({
    id: lenient(z.string()),
    name: z.string().min(1),
    updateAvailable: lenient(z.boolean()),
    link: lenient(z.string()),
    image: lenient(z.object({
        tag: lenient(z.object({
            value: lenient(z.string())
        }).passthrough())
    }).passthrough()),
    result: lenient(z.object({
        tag: lenient(z.string()),
        link: lenient(z.string())
    }).passthrough()),
    labels: lenient(labelsSchema)
}).passthrough();

export const containerListSchema = z.array(z.unknown());

export type ContainerRecord = z.infer<typeof containerRecordSchema>;

/** Container name -> record, replaced wholesale on every successful refresh */
export type RefreshSnapshot = ReadonlyMap<string, ContainerRecord>;

export interface BasicAuth {
    username: string;
    password: string;
}

/**
 * A `fetch`-compatible function. Every outbound request goes through one
 * session so tests can substitute an in-process fake.
 */
export type HttpSession = (input: string, init?: RequestInit) => Promise<Response>;

export interface WudInstanceConfig {
    name: string;
    protocol: 'http' | 'https';
    host: string;
    port: number;
    username: string;
    password: string;
    token: string;
}

export type EntityFeature = 'install' | 'release_notes';

/** Everything an update entity publishes, derived on read */
export interface EntityState {
    entityId: string;
    name: string;
    containerName: string;
    instanceName: string;
    icon: string;
    entityPicture: string;
    deviceClass: 'firmware';
    supportedFeatures: EntityFeature[];
    available: boolean;
    installedVersion: string | null;
    latestVersion: string | null;
    releaseUrl: string | null;
    inProgress: boolean;
    updateAvailable: boolean;
}
