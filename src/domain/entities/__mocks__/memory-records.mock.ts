import { fingerprintStory } from '../../services/fingerprint.service.js';
import { type CandidateStory } from '../candidate-story.entity.js';
import { MemoryRecord } from '../memory-record.entity.js';

import { getMockCandidateStory } from './candidate-stories.mock.js';

/**
 * Generates a mock `MemoryRecord` for a candidate, as if an article had been generated from it.
 */
export function getMockMemoryRecord(options?: {
    candidate?: CandidateStory;
    createdAt?: Date;
    generatedTitle?: string;
    sentiment?: number;
}): MemoryRecord {
    const candidate = options?.candidate ?? getMockCandidateStory();

    return new MemoryRecord({
        createdAt: options?.createdAt ?? new Date('2024-03-08T09:00:00.000Z'),
        fingerprint: fingerprintStory(candidate),
        generatedTitle: options?.generatedTitle ?? `Rewritten: ${candidate.title}`,
        sentiment: options?.sentiment ?? 0,
        sourceTitle: candidate.title,
        topic: candidate.topic,
        url: candidate.url,
    });
}
