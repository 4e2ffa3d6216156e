import type { HttpSession } from './types';
import { HTTPStatusError, TimeoutError, WudRequestError } from './errors';
import { defaultSession, withTimeout } from './http';
import { zone, errorMessage } from '../logging/zone';

const log = zone('wud.releaseNotes');

export const RELEASE_NOTES_TIMEOUT_MS = 10_000;

const GITHUB_WEB_PREFIX = /^https?:\/\/(www\.)?github\.com\//;
const GITHUB_API_PREFIX = 'https://api.github.com/repos/';

export type GithubReleaseKind = 'tag' | 'latest';

export function classifyGithubUrl(url: string): GithubReleaseKind | undefined {
    if (url.includes('/releases/tag/') || url.includes('/tags/')) return 'tag';
    if (url.includes('/releases/latest')) return 'latest';
    return undefined;
}

/**
 * Translate a github.com release page into the matching REST endpoint.
 * The web UI says `/releases/tag/<tag>`, the API `/releases/tags/<tag>`.
 */
export function toGithubApiUrl(url: string): string | undefined {
    const kind = classifyGithubUrl(url);
    if (!kind) return undefined;

    const apiUrl = url.replace(GITHUB_WEB_PREFIX, GITHUB_API_PREFIX);
    return kind === 'tag' ? apiUrl.replace('/releases/tag/', '/releases/tags/') : apiUrl;
}

export interface ReleaseNotesOptions {
    session?: HttpSession;
    githubToken?: string;
    timeoutMs?: number;
}

/**
 * Best-effort lookup of the release body behind a GitHub release URL.
 * Resolves to undefined whenever notes are not available; never rejects.
 */
export async function fetchReleaseNotes(
    releaseUrl: string | undefined,
    options: ReleaseNotesOptions = {}
): Promise<string | undefined> {
    if (!releaseUrl || !releaseUrl.includes('github.com')) {
        log.debug({ message: 'No GitHub URL found or not applicable', data: { releaseUrl } });
        return undefined;
    }

    const apiUrl = toGithubApiUrl(releaseUrl);
    if (!apiUrl) {
        log.warn({ message: 'Unsupported GitHub URL format', data: { releaseUrl } });
        return undefined;
    }

    const session = options.session ?? defaultSession;
    const timeoutMs = options.timeoutMs ?? RELEASE_NOTES_TIMEOUT_MS;
    const headers: Record<string, string> = { Accept: 'application/vnd.github.v3+json' };
    if (options.githubToken) {
        headers.Authorization = `token ${options.githubToken}`;
    }

    try {
        return await withTimeout(apiUrl, timeoutMs, async (signal) => {
            const response = await session(apiUrl, { method: 'GET', headers, signal });

            if (response.status === 403) {
                log.warn({ message: 'GitHub API rate limit exceeded', data: { apiUrl } });
                return undefined;
            }
            if (!response.ok) {
                throw new HTTPStatusError(apiUrl, response.status);
            }

            const payload: unknown = await response.json();
            if (payload && typeof payload === 'object' && 'body' in payload && typeof payload.body === 'string') {
                return payload.body;
            }
            return undefined;
        });
    } catch (err) {
        if (err instanceof TimeoutError) {
            log.error({ message: 'Timeout fetching release notes from GitHub', data: { apiUrl } });
        } else if (err instanceof WudRequestError) {
            log.error({ message: 'Error fetching release notes from GitHub API', data: { apiUrl, error: errorMessage(err) } });
        } else {
            log.error({ message: 'Unexpected error fetching release notes', data: { apiUrl, error: errorMessage(err) } });
        }
        return undefined;
    }
}
