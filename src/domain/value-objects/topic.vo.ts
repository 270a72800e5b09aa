import { z } from 'zod/v4';

export const topicSchema = z
    .enum([
        'business',
        'entertainment',
        'general',
        'health',
        'politics',
        'science',
        'sports',
        'technology',
        'world',
    ])
    .describe('The editorial topic a story was fetched for.');

export type TopicEnum = z.infer<typeof topicSchema>;

export class Topic {
    public readonly value: TopicEnum;

    constructor(topic: string) {
        const normalizedTopic = topic.trim().toLowerCase();
        const result = topicSchema.safeParse(normalizedTopic);

        if (!result.success) {
            this.value = 'general';
        } else {
            this.value = result.data;
        }
    }

    public equals(other: Topic): boolean {
        return this.value === other.value;
    }

    public toString(): TopicEnum {
        return this.value;
    }
}
