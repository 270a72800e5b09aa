import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { type CandidateStory } from '../../../domain/entities/candidate-story.entity.js';
import { MemoryRecord } from '../../../domain/entities/memory-record.entity.js';
import { DuplicateKeyError } from '../../../domain/errors/memory.errors.js';
import { fingerprintStory } from '../../../domain/services/fingerprint.service.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';
import { type ClockPort } from '../../ports/outbound/time/clock.port.js';

export interface AcceptedStory {
    candidate: CandidateStory;
    generatedTitle: string;
    sentiment: number;
}

export type RecordAcceptedResult = {
    status: 'already-known' | 'recorded';
    url: string;
};

/**
 * Use case for remembering a story once an article has been generated from it
 */
export class RecordAcceptedStoryUseCase {
    constructor(
        private readonly memoryStore: MemoryStorePort,
        private readonly clock: ClockPort,
        private readonly logger: LoggerPort,
        private readonly options: { persistOnWrite: boolean },
    ) {}

    /**
     * @throws InvalidRecordError when the generated title or sentiment is unusable
     */
    public async execute({
        candidate,
        generatedTitle,
        sentiment,
    }: AcceptedStory): Promise<RecordAcceptedResult> {
        const record = new MemoryRecord({
            createdAt: this.clock.now(),
            fingerprint: fingerprintStory(candidate),
            generatedTitle,
            sentiment,
            sourceTitle: candidate.title,
            topic: candidate.topic,
            url: candidate.url,
        });

        try {
            await this.memoryStore.add(record);
        } catch (error) {
            // Another pipeline recorded the URL first, which is what this call wanted anyway
            if (error instanceof DuplicateKeyError) {
                this.logger.info('memory:record:already-known', { url: record.url });
                return { status: 'already-known', url: record.url };
            }
            throw error;
        }

        this.logger.info('memory:record:added', {
            sentiment: record.sentiment,
            topic: record.topic.toString(),
            url: record.url,
        });

        if (this.options.persistOnWrite) {
            await this.persist();
        }

        return { status: 'recorded', url: record.url };
    }

    private async persist(): Promise<void> {
        try {
            await this.memoryStore.persist();
        } catch (error) {
            this.logger.error('memory:persist:error', { error });
        }
    }
}
