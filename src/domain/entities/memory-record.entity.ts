import { z } from 'zod/v4';

import { InvalidRecordError } from '../errors/memory.errors.js';
import { Fingerprint } from '../value-objects/fingerprint.vo.js';
import { sentimentSchema } from '../value-objects/sentiment.vo.js';
import { storyUrlSchema } from '../value-objects/story-url.vo.js';
import { Topic } from '../value-objects/topic.vo.js';

export const memoryRecordSchema = z
    .object({
        createdAt: z.date().describe('When the story was accepted and recorded.'),
        fingerprint: z.instanceof(Fingerprint).describe('Identity signature of the source story.'),
        generatedTitle: z
            .string()
            .trim()
            .min(1)
            .describe('The title of the article generated from the story.'),
        sentiment: sentimentSchema,
        sourceTitle: z.string().trim().min(1).describe('The headline of the source story.'),
        topic: z.instanceof(Topic).describe('The topic the story was fetched for.'),
        url: storyUrlSchema,
    })
    .refine((record) => record.fingerprint.url === record.url, {
        message: 'Fingerprint url must match the record url',
        path: ['fingerprint'],
    });

export type MemoryRecordProps = z.input<typeof memoryRecordSchema>;

/**
 * @description A story the pipeline has already turned into an article.
 * Records are immutable; they only leave memory once expired.
 */
export class MemoryRecord {
    public readonly createdAt: Date;
    public readonly fingerprint: Fingerprint;
    public readonly generatedTitle: string;
    public readonly sentiment: number;
    public readonly sourceTitle: string;
    public readonly topic: Topic;
    public readonly url: string;

    public constructor(data: MemoryRecordProps) {
        const result = memoryRecordSchema.safeParse(data);

        if (!result.success) {
            throw new InvalidRecordError(
                result.error.message,
                result.error.issues.map(
                    (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
                ),
            );
        }

        const validatedData = result.data;
        this.createdAt = validatedData.createdAt;
        this.fingerprint = validatedData.fingerprint;
        this.generatedTitle = validatedData.generatedTitle;
        this.sentiment = validatedData.sentiment;
        this.sourceTitle = validatedData.sourceTitle;
        this.topic = validatedData.topic;
        this.url = validatedData.url;
    }

    /**
     * Whether the record is older than the retention horizon at the given instant
     */
    public isExpired(now: Date, horizonMs: number): boolean {
        return this.createdAt.getTime() < now.getTime() - horizonMs;
    }
}
