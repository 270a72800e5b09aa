import { describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

// Domain
import { getMockCandidateStory } from '../../../../domain/entities/__mocks__/candidate-stories.mock.js';
import { getMockMemoryRecord } from '../../../../domain/entities/__mocks__/memory-records.mock.js';

// Ports
import { type MemoryStorePort } from '../../../ports/outbound/persistence/memory-store.port.js';

import { GetMemoryStatsUseCase } from '../get-memory-stats.use-case.js';

describe('GetMemoryStatsUseCase', () => {
    test('should describe the records held in memory', () => {
        // Given - three records, two of them with the same generated title
        const mockMemoryStore = mock<MemoryStorePort>();
        mockMemoryStore.allRecords.mockReturnValue([
            getMockMemoryRecord({
                candidate: getMockCandidateStory({ topic: 'world', url: 'https://a.example.com' }),
                createdAt: new Date('2024-03-08T10:00:00.000Z'),
                generatedTitle: 'Summit ends without a deal',
            }),
            getMockMemoryRecord({
                candidate: getMockCandidateStory({ topic: 'world', url: 'https://b.example.com' }),
                createdAt: new Date('2024-03-06T10:00:00.000Z'),
                generatedTitle: 'Summit ends without a deal!',
            }),
            getMockMemoryRecord({
                candidate: getMockCandidateStory({
                    topic: 'science',
                    url: 'https://c.example.com',
                }),
                createdAt: new Date('2024-03-07T10:00:00.000Z'),
                generatedTitle: 'Comet visible this week',
            }),
        ]);

        // When - computing stats
        const stats = new GetMemoryStatsUseCase(mockMemoryStore).execute();

        // Then - counts and bounds reflect the records
        expect(stats).toEqual({
            newestRecordAt: new Date('2024-03-08T10:00:00.000Z'),
            oldestRecordAt: new Date('2024-03-06T10:00:00.000Z'),
            records: 3,
            titles: 2,
            topicTrends: { science: 1, world: 2 },
            urls: 3,
        });
    });

    test('should report an empty memory', () => {
        const mockMemoryStore = mock<MemoryStorePort>();
        mockMemoryStore.allRecords.mockReturnValue([]);

        expect(new GetMemoryStatsUseCase(mockMemoryStore).execute()).toEqual({
            newestRecordAt: null,
            oldestRecordAt: null,
            records: 0,
            titles: 0,
            topicTrends: {},
            urls: 0,
        });
    });
});
