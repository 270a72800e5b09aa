// Domain
import { aggregateTrends } from '../../../domain/services/trend-aggregator.service.js';
import { type TrendSnapshot } from '../../../domain/value-objects/trend-snapshot.vo.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';
import { type ClockPort } from '../../ports/outbound/time/clock.port.js';

export interface TrendReport {
    generatedAt: Date;
    snapshot: TrendSnapshot;
    windowMs: number;
}

/**
 * Use case for summarizing recently recorded topics and their sentiment
 */
export class GetTrendsUseCase {
    constructor(
        private readonly memoryStore: MemoryStorePort,
        private readonly clock: ClockPort,
        private readonly defaultWindowMs: number,
    ) {}

    public execute(windowMs: number = this.defaultWindowMs): TrendReport {
        const now = this.clock.now();
        const snapshot = aggregateTrends(this.memoryStore.allRecords(), { now, windowMs });

        return { generatedAt: now, snapshot, windowMs };
    }
}
