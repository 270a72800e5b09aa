import { beforeEach, describe, expect, test } from 'vitest';
import { type MockProxy, mock } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { getMockCandidateStory } from '../../../domain/entities/__mocks__/candidate-stories.mock.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';

// Use cases
import { type EvaluateCandidateUseCase } from '../../use-cases/memory/evaluate-candidate.use-case.js';
import { type GetMemoryStatsUseCase } from '../../use-cases/memory/get-memory-stats.use-case.js';
import { type GetTrendsUseCase } from '../../use-cases/memory/get-trends.use-case.js';
import { type RecordAcceptedStoryUseCase } from '../../use-cases/memory/record-accepted-story.use-case.js';
import { ResetMemoryUseCase } from '../../use-cases/memory/reset-memory.use-case.js';
import { type SweepMemoryUseCase } from '../../use-cases/memory/sweep-memory.use-case.js';

import { MemoryFacade } from '../memory.facade.js';

describe('MemoryFacade', () => {
    let mockMemoryStore: MockProxy<MemoryStorePort>;
    let mockEvaluateCandidate: MockProxy<EvaluateCandidateUseCase>;
    let mockRecordAcceptedStory: MockProxy<RecordAcceptedStoryUseCase>;
    let mockGetTrends: MockProxy<GetTrendsUseCase>;
    let mockSweepMemory: MockProxy<SweepMemoryUseCase>;
    let mockGetMemoryStats: MockProxy<GetMemoryStatsUseCase>;
    let mockResetMemory: MockProxy<ResetMemoryUseCase>;
    let mockLogger: MockProxy<LoggerPort>;
    let facade: MemoryFacade;

    beforeEach(() => {
        mockMemoryStore = mock<MemoryStorePort>();
        mockEvaluateCandidate = mock<EvaluateCandidateUseCase>();
        mockRecordAcceptedStory = mock<RecordAcceptedStoryUseCase>();
        mockGetTrends = mock<GetTrendsUseCase>();
        mockSweepMemory = mock<SweepMemoryUseCase>();
        mockGetMemoryStats = mock<GetMemoryStatsUseCase>();
        mockResetMemory = mock<ResetMemoryUseCase>();
        mockLogger = mock<LoggerPort>();

        facade = new MemoryFacade(
            mockMemoryStore,
            mockEvaluateCandidate,
            mockRecordAcceptedStory,
            mockGetTrends,
            mockSweepMemory,
            mockGetMemoryStats,
            mockResetMemory,
            mockLogger,
        );
    });

    describe('shouldProcess', () => {
        test('should process a story that is not a duplicate', () => {
            mockEvaluateCandidate.execute.mockReturnValue({ duplicate: false });

            expect(facade.shouldProcess(getMockCandidateStory())).toBe(true);
        });

        test('should skip a duplicate story', () => {
            mockEvaluateCandidate.execute.mockReturnValue({
                duplicate: true,
                matchedUrl: 'https://news.example.com/riverside-park',
                reason: 'url',
                similarity: 1,
            });

            expect(facade.shouldProcess(getMockCandidateStory())).toBe(false);
        });
    });

    test('should hand accepted stories to the record use case', async () => {
        // Given - a generated article for a candidate
        const candidate = getMockCandidateStory();
        mockRecordAcceptedStory.execute.mockResolvedValue({
            status: 'recorded',
            url: candidate.url,
        });

        // When - recording it
        const result = await facade.recordAccepted(candidate, 'Park plan approved', 0.3);

        // Then - the use case receives the story
        expect(result).toEqual({ status: 'recorded', url: candidate.url });
        expect(mockRecordAcceptedStory.execute).toHaveBeenCalledWith({
            candidate,
            generatedTitle: 'Park plan approved',
            sentiment: 0.3,
        });
    });

    test('should pass the sweep horizon through', async () => {
        mockSweepMemory.execute.mockResolvedValue(2);

        await expect(facade.sweep(1000)).resolves.toBe(2);
        expect(mockSweepMemory.execute).toHaveBeenCalledWith(1000);
    });

    test('should resolve a reset with the removed count when the write fails', async () => {
        // Given - a store holding three records whose file cannot be written
        const error = new Error('disk full');
        mockMemoryStore.reset.mockResolvedValue(3);
        mockMemoryStore.persist.mockRejectedValue(error);
        const resettingFacade = new MemoryFacade(
            mockMemoryStore,
            mockEvaluateCandidate,
            mockRecordAcceptedStory,
            mockGetTrends,
            mockSweepMemory,
            mockGetMemoryStats,
            new ResetMemoryUseCase(mockMemoryStore, mockLogger, { persistOnWrite: true }),
            mockLogger,
        );

        // When - resetting
        const removed = await resettingFacade.reset();

        // Then - the reset succeeds and the write failure is logged
        expect(removed).toBe(3);
        expect(mockLogger.error).toHaveBeenCalledWith('memory:persist:error', { error });
    });

    describe('initialize', () => {
        test('should load memory without resetting by default', async () => {
            // Given - a persisted memory
            mockMemoryStore.load.mockResolvedValue({ recordCount: 5, status: 'loaded' });

            // When - initializing
            const result = await facade.initialize({ resetOnStartup: false });

            // Then - the records are kept
            expect(result).toEqual({ recordCount: 5, status: 'loaded' });
            expect(mockResetMemory.execute).not.toHaveBeenCalled();
        });

        test('should reset after loading when asked to', async () => {
            mockMemoryStore.load.mockResolvedValue({ recordCount: 5, status: 'loaded' });
            mockResetMemory.execute.mockResolvedValue(5);

            await facade.initialize({ resetOnStartup: true });

            expect(mockResetMemory.execute).toHaveBeenCalledTimes(1);
        });

        test('should log a failed reset and carry on', async () => {
            // Given - a reset that fails
            const error = new Error('store unavailable');
            mockMemoryStore.load.mockResolvedValue({ recordCount: 0, status: 'missing' });
            mockResetMemory.execute.mockRejectedValue(error);

            // When - initializing with a reset
            const result = await facade.initialize({ resetOnStartup: true });

            // Then - the failure is logged
            expect(result.status).toBe('missing');
            expect(mockLogger.error).toHaveBeenCalledWith('memory:reset:error', { error });
        });
    });

    test('should log instead of failing when flushing fails', async () => {
        // Given - a failing disk
        const error = new Error('disk full');
        mockMemoryStore.persist.mockRejectedValue(error);

        // When - flushing
        await facade.flush();

        // Then - the error is logged
        expect(mockLogger.error).toHaveBeenCalledWith('memory:flush:error', { error });
    });
});
