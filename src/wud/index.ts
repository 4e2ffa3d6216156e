/**
 * WUD integration - polls What's Up Docker and projects containers into update entities
 */

export { RefreshCoordinator, DEFAULT_UPDATE_INTERVAL_MS } from './coordinator';
export type { CoordinatorOptions, RefreshListener } from './coordinator';

export { UpdateEntity, ENTITY_ICON, ENTITY_PICTURE, SUPPORTED_FEATURES } from './entity';
export type { UpdateEntityOptions, StateWriter } from './entity';

export {
    buildSnapshot,
    containersUrl,
    fetchContainers,
    validateConnection,
    FETCH_TIMEOUT_MS,
    PROBE_TIMEOUT_MS
} from './fetcher';
export type { ConnectionCheck } from './fetcher';

export { installedVersion, latestVersion, releaseUrl, fixupReleaseLink, trailingDigits } from './projection';
export { fetchReleaseNotes, toGithubApiUrl, classifyGithubUrl, RELEASE_NOTES_TIMEOUT_MS } from './releaseNotes';
export { installUpdate, triggerEndpoint, triggerPath, INSTALL_TIMEOUT_MS } from './install';

export {
    WudRequestError,
    ConnectError,
    TimeoutError,
    HTTPStatusError,
    DataError,
    SetupError
} from './errors';

export { TRIGGER_LABEL, containerRecordSchema, containerListSchema } from './types';
export type {
    BasicAuth,
    ContainerRecord,
    EntityFeature,
    EntityState,
    HttpSession,
    RefreshSnapshot,
    WudInstanceConfig
} from './types';
