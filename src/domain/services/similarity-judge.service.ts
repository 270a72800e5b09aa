import { type CandidateStory } from '../entities/candidate-story.entity.js';
import { type MemoryRecord } from '../entities/memory-record.entity.js';

import { fingerprintStory, tokenizeTitle } from './fingerprint.service.js';

/**
 * Read-only view of memory the judge compares candidates against.
 * Both members exclude expired records.
 */
export interface RecordSource {
    allRecords(): Iterable<MemoryRecord>;
    contains(url: string): boolean;
}

export interface SimilarityJudgeOptions {
    /** Titles with fewer tokens are never judged near-duplicates */
    minTitleTokens: number;
    /** Jaccard ratio of title tokens, in (0, 1], at or above which titles are the same story */
    titleSimilarityThreshold: number;
}

export type DuplicateReason = 'content' | 'title' | 'url';

export type DuplicateVerdict =
    | { duplicate: false }
    | { duplicate: true; matchedUrl: string; reason: DuplicateReason; similarity: number };

/**
 * Jaccard ratio of two token sets; 0 when either is empty
 */
export function tokenOverlap(left: Set<string>, right: Set<string>): number {
    if (left.size === 0 || right.size === 0) {
        return 0;
    }

    let shared = 0;
    for (const token of left) {
        if (right.has(token)) {
            shared++;
        }
    }

    return shared / (left.size + right.size - shared);
}

/**
 * Decides whether a candidate story is already known.
 * Checks run in order and stop at the first hit: exact URL, identical body, then a similar
 * title within the same topic.
 */
export class SimilarityJudge {
    constructor(private readonly options: SimilarityJudgeOptions) {
        if (options.titleSimilarityThreshold <= 0 || options.titleSimilarityThreshold > 1) {
            const threshold = options.titleSimilarityThreshold;
            throw new Error(`Invalid title similarity threshold: ${threshold}. Expected (0, 1]`);
        }
    }

    public isDuplicate(candidate: CandidateStory, source: RecordSource): boolean {
        return this.judge(candidate, source).duplicate;
    }

    public judge(candidate: CandidateStory, source: RecordSource): DuplicateVerdict {
        if (source.contains(candidate.url)) {
            return { duplicate: true, matchedUrl: candidate.url, reason: 'url', similarity: 1 };
        }

        const fingerprint = fingerprintStory(candidate);
        const candidateTokens = tokenizeTitle(candidate.title);
        const judgeTitles = candidateTokens.size >= this.options.minTitleTokens;
        let titleMatch: DuplicateVerdict = { duplicate: false };

        // A content match anywhere outranks a title match; only the first title hit is kept
        for (const record of source.allRecords()) {
            if (fingerprint.sharesContentWith(record.fingerprint)) {
                return {
                    duplicate: true,
                    matchedUrl: record.url,
                    reason: 'content',
                    similarity: 1,
                };
            }

            if (titleMatch.duplicate || !judgeTitles || !record.topic.equals(candidate.topic)) {
                continue;
            }

            const similarity = this.titleSimilarity(candidateTokens, record);
            if (similarity >= this.options.titleSimilarityThreshold) {
                titleMatch = {
                    duplicate: true,
                    matchedUrl: record.url,
                    reason: 'title',
                    similarity,
                };
            }
        }

        return titleMatch;
    }

    private titleSimilarity(candidateTokens: Set<string>, record: MemoryRecord): number {
        let best = 0;

        for (const title of [record.sourceTitle, record.generatedTitle]) {
            const tokens = tokenizeTitle(title);
            if (tokens.size < this.options.minTitleTokens) {
                continue;
            }
            best = Math.max(best, tokenOverlap(candidateTokens, tokens));
        }

        return best;
    }
}
