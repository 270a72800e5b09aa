import { Topic } from '../../value-objects/topic.vo.js';
import { CandidateStory } from '../candidate-story.entity.js';

/**
 * Generates a single mock `CandidateStory` with optional overrides.
 */
export function getMockCandidateStory(options?: {
    body?: string;
    fetchedAt?: Date;
    title?: string;
    topic?: string;
    url?: string;
}): CandidateStory {
    return new CandidateStory({
        body: options?.body ?? 'City council approves the new riverside park after a long debate.',
        fetchedAt: options?.fetchedAt ?? new Date('2024-03-08T09:00:00.000Z'),
        title: options?.title ?? 'City council approves riverside park plan',
        topic: new Topic(options?.topic ?? 'general'),
        url: options?.url ?? 'https://news.example.com/riverside-park',
    });
}

