import { createHash } from 'node:crypto';

import { type CandidateStory } from '../entities/candidate-story.entity.js';
import { EMPTY_CONTENT_HASH, Fingerprint } from '../value-objects/fingerprint.vo.js';

const sha256 = (value: string): string => createHash('sha256').update(value, 'utf8').digest('hex');

/**
 * Case-folds a title and strips accents, punctuation and redundant whitespace,
 * so the same headline formatted differently by two sources normalizes identically.
 */
export function normalizeTitle(title: string): string {
    return title
        .normalize('NFKD')
        .replace(/\p{M}+/gu, '')
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();
}

export function tokenizeTitle(title: string): Set<string> {
    const normalized = normalizeTitle(title);
    return new Set(normalized.length > 0 ? normalized.split(' ') : []);
}

export function hashTitle(title: string): string {
    return sha256(normalizeTitle(title));
}

export function hashContent(body: string): string {
    const normalized = body.replace(/\s+/g, ' ').trim();
    return normalized.length > 0 ? sha256(normalized) : EMPTY_CONTENT_HASH;
}

export function fingerprintStory(candidate: CandidateStory): Fingerprint {
    return new Fingerprint({
        contentHash: hashContent(candidate.body),
        titleHash: hashTitle(candidate.title),
        url: candidate.url,
    });
}
