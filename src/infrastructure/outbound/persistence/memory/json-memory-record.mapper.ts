import { z } from 'zod/v4';

// Domain
import { MemoryRecord } from '../../../../domain/entities/memory-record.entity.js';
import { Fingerprint } from '../../../../domain/value-objects/fingerprint.vo.js';
import { canonicalizeUrl } from '../../../../domain/value-objects/story-url.vo.js';
import { Topic, topicSchema } from '../../../../domain/value-objects/topic.vo.js';

export const MEMORY_STATE_VERSION = 1;

export const persistedRecordSchema = z.object({
    createdAt: z.iso.datetime(),
    fingerprint: z.object({
        contentHash: z.string().min(1),
        titleHash: z.string().min(1),
    }),
    generatedTitle: z.string(),
    sentiment: z.number(),
    sourceTitle: z.string(),
    topic: topicSchema,
});

export const memoryStateSchema = z.object({
    records: z.record(z.string(), persistedRecordSchema),
    savedAt: z.iso.datetime(),
    version: z.literal(MEMORY_STATE_VERSION),
});

export type PersistedRecord = z.infer<typeof persistedRecordSchema>;
export type MemoryState = z.infer<typeof memoryStateSchema>;

export class JsonMemoryRecordMapper {
    /**
     * @throws InvalidRecordError when the persisted fields do not form a valid record
     */
    static toDomain(key: string, persisted: PersistedRecord): MemoryRecord {
        const url = canonicalizeUrl(key);

        return new MemoryRecord({
            createdAt: new Date(persisted.createdAt),
            fingerprint: new Fingerprint({
                contentHash: persisted.fingerprint.contentHash,
                titleHash: persisted.fingerprint.titleHash,
                url,
            }),
            generatedTitle: persisted.generatedTitle,
            sentiment: persisted.sentiment,
            sourceTitle: persisted.sourceTitle,
            topic: new Topic(persisted.topic),
            url,
        });
    }

    static toPersistence(record: MemoryRecord): PersistedRecord {
        return {
            createdAt: record.createdAt.toISOString(),
            fingerprint: {
                contentHash: record.fingerprint.contentHash,
                titleHash: record.fingerprint.titleHash,
            },
            generatedTitle: record.generatedTitle,
            sentiment: record.sentiment,
            sourceTitle: record.sourceTitle,
            topic: record.topic.value,
        };
    }

    static toState(records: Iterable<MemoryRecord>, savedAt: Date): MemoryState {
        const state: MemoryState = {
            records: {},
            savedAt: savedAt.toISOString(),
            version: MEMORY_STATE_VERSION,
        };

        for (const record of records) {
            state.records[record.url] = JsonMemoryRecordMapper.toPersistence(record);
        }

        return state;
    }
}
