// Domain
import { normalizeTitle } from '../../../domain/services/fingerprint.service.js';
import { type TopicEnum } from '../../../domain/value-objects/topic.vo.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';

export interface MemoryStats {
    newestRecordAt: Date | null;
    oldestRecordAt: Date | null;
    records: number;
    titles: number;
    topicTrends: Partial<Record<TopicEnum, number>>;
    urls: number;
}

/**
 * Use case for describing what the memory currently holds
 */
export class GetMemoryStatsUseCase {
    constructor(private readonly memoryStore: MemoryStorePort) {}

    public execute(): MemoryStats {
        const urls = new Set<string>();
        const titles = new Set<string>();
        const topicTrends: Partial<Record<TopicEnum, number>> = {};
        let oldest: Date | null = null;
        let newest: Date | null = null;
        let records = 0;

        for (const record of this.memoryStore.allRecords()) {
            records++;
            urls.add(record.url);
            titles.add(normalizeTitle(record.generatedTitle));

            const topic = record.topic.value;
            topicTrends[topic] = (topicTrends[topic] ?? 0) + 1;

            if (!oldest || record.createdAt < oldest) {
                oldest = record.createdAt;
            }
            if (!newest || record.createdAt > newest) {
                newest = record.createdAt;
            }
        }

        return {
            newestRecordAt: newest,
            oldestRecordAt: oldest,
            records,
            titles: titles.size,
            topicTrends,
            urls: urls.size,
        };
    }
}
