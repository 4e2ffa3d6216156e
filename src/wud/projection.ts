import type { ContainerRecord } from './types';

const TRAILING_DIGITS = /\d+$/;
const UNDEFINED_SUFFIX = 'undefined';

export function installedVersion(record: ContainerRecord | undefined): string | undefined {
    return record?.image?.tag?.value;
}

export function latestVersion(record: ContainerRecord | undefined): string | undefined {
    if (!record) return undefined;
    return record.updateAvailable ? record.result?.tag : installedVersion(record);
}

/** Trailing run of decimal digits of a tag, e.g. "3" for "v1.2.3-rc3" */
export function trailingDigits(tag: string | undefined): string | undefined {
    return tag ? TRAILING_DIGITS.exec(tag)?.[0] : undefined;
}

/**
 * WUD sometimes builds links for pre-release tags that end in "undefined"
 * or in a bare ".". Repair them from the tag's trailing digits; any other
 * link is returned as is.
 */
export function fixupReleaseLink(link: string, tag: string | undefined): string {
    if (link.endsWith(UNDEFINED_SUFFIX)) {
        const digits = trailingDigits(tag);
        return digits === undefined ? link : link.replaceAll(UNDEFINED_SUFFIX, digits);
    }

    if (link.endsWith('.')) {
        const digits = trailingDigits(tag);
        return digits === undefined ? link : link + digits;
    }

    return link;
}

export function releaseUrl(record: ContainerRecord | undefined): string | undefined {
    if (!record) return undefined;

    const link = record.updateAvailable ? record.result?.link : record.link;
    if (!link) return link;

    return fixupReleaseLink(link, latestVersion(record));
}
