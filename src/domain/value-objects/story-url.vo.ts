import { z } from 'zod/v4';

const TRACKING_PARAM_PREFIX = 'utm_';

/**
 * Reduces a story URL to the key used for memory lookups.
 * Absolute URLs lose their fragment and tracking parameters; anything else is only trimmed.
 */
export function canonicalizeUrl(url: string): string {
    const trimmed = url.trim();

    if (!URL.canParse(trimmed)) {
        return trimmed;
    }

    const parsed = new URL(trimmed);
    parsed.hash = '';

    for (const key of [...parsed.searchParams.keys()]) {
        if (key.toLowerCase().startsWith(TRACKING_PARAM_PREFIX)) {
            parsed.searchParams.delete(key);
        }
    }

    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
        parsed.pathname = parsed.pathname.replace(/\/+$/, '');
    }

    return parsed.toString();
}

export const storyUrlSchema = z
    .string()
    .trim()
    .min(1)
    .transform(canonicalizeUrl)
    .describe('The source URL of a story, canonicalized for lookups.');
