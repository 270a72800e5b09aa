import { z } from 'zod/v4';

import { storyUrlSchema } from '../value-objects/story-url.vo.js';
import { Topic } from '../value-objects/topic.vo.js';

export const candidateStorySchema = z.object({
    body: z.string().default('').describe('The body text as fetched, possibly empty.'),
    fetchedAt: z.date().describe('When the fetch adapter retrieved the story.'),
    title: z.string().trim().min(1).describe('The headline as published by the source.'),
    topic: z.instanceof(Topic).describe('The topic the story was fetched for.'),
    url: storyUrlSchema,
});

export type CandidateStoryProps = z.input<typeof candidateStorySchema>;

/**
 * @description A fetched news story that has not been evaluated for processing yet
 */
export class CandidateStory {
    public readonly body: string;
    public readonly fetchedAt: Date;
    public readonly title: string;
    public readonly topic: Topic;
    public readonly url: string;

    public constructor(data: CandidateStoryProps) {
        const result = candidateStorySchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid candidate story: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.body = validatedData.body;
        this.fetchedAt = validatedData.fetchedAt;
        this.title = validatedData.title;
        this.topic = validatedData.topic;
        this.url = validatedData.url;
    }
}
