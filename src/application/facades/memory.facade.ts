import { type LoggerPort } from '../../shared/logger/logger.port.js';

// Domain
import { type CandidateStory } from '../../domain/entities/candidate-story.entity.js';
import { type DuplicateVerdict } from '../../domain/services/similarity-judge.service.js';

// Ports
import {
    type LoadResult,
    type MemoryStorePort,
} from '../ports/outbound/persistence/memory-store.port.js';

// Use cases
import { type EvaluateCandidateUseCase } from '../use-cases/memory/evaluate-candidate.use-case.js';
import {
    type GetMemoryStatsUseCase,
    type MemoryStats,
} from '../use-cases/memory/get-memory-stats.use-case.js';
import { type GetTrendsUseCase, type TrendReport } from '../use-cases/memory/get-trends.use-case.js';
import {
    type RecordAcceptedResult,
    type RecordAcceptedStoryUseCase,
} from '../use-cases/memory/record-accepted-story.use-case.js';
import { type ResetMemoryUseCase } from '../use-cases/memory/reset-memory.use-case.js';
import { type SweepMemoryUseCase } from '../use-cases/memory/sweep-memory.use-case.js';

/**
 * Single entry point of the content memory for the rest of the pipeline.
 * Holds no state; everything lives in the injected store.
 */
export class MemoryFacade {
    constructor(
        private readonly memoryStore: MemoryStorePort,
        private readonly evaluateCandidate: EvaluateCandidateUseCase,
        private readonly recordAcceptedStory: RecordAcceptedStoryUseCase,
        private readonly getTrends: GetTrendsUseCase,
        private readonly sweepMemory: SweepMemoryUseCase,
        private readonly getMemoryStats: GetMemoryStatsUseCase,
        private readonly resetMemory: ResetMemoryUseCase,
        private readonly logger: LoggerPort,
    ) {}

    public evaluate(candidate: CandidateStory): DuplicateVerdict {
        return this.evaluateCandidate.execute(candidate);
    }

    /**
     * Persist whatever is in memory, logging instead of failing
     */
    public async flush(): Promise<void> {
        try {
            await this.memoryStore.persist();
        } catch (error) {
            this.logger.error('memory:flush:error', { error });
        }
    }

    /**
     * Restore persisted memory, optionally starting over from an empty one
     */
    public async initialize(options: { resetOnStartup: boolean }): Promise<LoadResult> {
        const result = await this.memoryStore.load();

        if (options.resetOnStartup) {
            try {
                await this.resetMemory.execute();
            } catch (error) {
                this.logger.error('memory:reset:error', { error });
            }
        }

        return result;
    }

    public recordAccepted(
        candidate: CandidateStory,
        generatedTitle: string,
        sentiment: number,
    ): Promise<RecordAcceptedResult> {
        return this.recordAcceptedStory.execute({ candidate, generatedTitle, sentiment });
    }

    public reset(): Promise<number> {
        return this.resetMemory.execute();
    }

    public shouldProcess(candidate: CandidateStory): boolean {
        return !this.evaluateCandidate.execute(candidate).duplicate;
    }

    public stats(): MemoryStats {
        return this.getMemoryStats.execute();
    }

    public sweep(horizonMs?: number): Promise<number> {
        return this.sweepMemory.execute(horizonMs);
    }

    public trends(windowMs?: number): TrendReport {
        return this.getTrends.execute(windowMs);
    }
}
