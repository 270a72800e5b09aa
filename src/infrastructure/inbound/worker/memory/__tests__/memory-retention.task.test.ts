import { beforeEach, describe, expect, test } from 'vitest';
import { type MockProxy, mock } from 'vitest-mock-extended';

import { daysToMs } from '../../../../../shared/date/durations.js';
import { type LoggerPort } from '../../../../../shared/logger/logger.port.js';

// Application
import { type MemoryFacade } from '../../../../../application/facades/memory.facade.js';

import { MemoryRetentionTask } from '../memory-retention.task.js';

describe('MemoryRetentionTask', () => {
    let mockMemory: MockProxy<MemoryFacade>;
    let mockLogger: MockProxy<LoggerPort>;
    let task: MemoryRetentionTask;

    beforeEach(() => {
        mockMemory = mock<MemoryFacade>();
        mockLogger = mock<LoggerPort>();
        task = new MemoryRetentionTask(
            mockMemory,
            daysToMs(7),
            { executeOnStartup: true, schedule: '*/30 * * * *' },
            mockLogger,
        );
    });

    test('should take its schedule from configuration', () => {
        expect(task.name).toBe('memory-retention');
        expect(task.schedule).toBe('*/30 * * * *');
        expect(task.executeOnStartup).toBe(true);
    });

    test('should sweep with the retention horizon', async () => {
        // Given - two expired records out of seven
        mockMemory.sweep.mockResolvedValue(2);
        mockMemory.stats.mockReturnValue({
            newestRecordAt: null,
            oldestRecordAt: null,
            records: 5,
            titles: 5,
            topicTrends: {},
            urls: 5,
        });

        // When - the task runs
        await task.execute();

        // Then - the sweep used the configured horizon
        expect(mockMemory.sweep).toHaveBeenCalledWith(daysToMs(7));
        expect(mockLogger.info).toHaveBeenCalledWith('Memory retention task finished', {
            remaining: 5,
            removed: 2,
        });
    });

    test('should log and rethrow a failed sweep', async () => {
        const error = new Error('lock poisoned');
        mockMemory.sweep.mockRejectedValue(error);

        await expect(task.execute()).rejects.toThrow('lock poisoned');
        expect(mockLogger.error).toHaveBeenCalledWith(
            'Memory retention task encountered an error',
            { error },
        );
    });
});
