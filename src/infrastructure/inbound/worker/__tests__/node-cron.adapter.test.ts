import cron, { type ScheduledTask } from 'node-cron';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { type MockProxy, mock } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';

import { NodeCronAdapter } from '../node-cron.adapter.js';

vi.mock('node-cron', () => ({
    default: {
        schedule: vi.fn(),
        validate: vi.fn(),
    },
}));

const createTask = (overrides?: Partial<TaskPort>): TaskPort => ({
    execute: vi.fn().mockResolvedValue(undefined),
    executeOnStartup: false,
    name: 'test-task',
    schedule: '0 * * * *',
    ...overrides,
});

const scheduledCallback = (index = 0): (() => void) => {
    const callback = vi.mocked(cron.schedule).mock.calls[index]?.[1];
    if (typeof callback !== 'function') {
        throw new Error('No task was scheduled');
    }
    return () => callback(new Date());
};

describe('NodeCronAdapter', () => {
    let mockLogger: MockProxy<LoggerPort>;
    let mockScheduledTask: MockProxy<ScheduledTask>;

    beforeEach(() => {
        vi.mocked(cron.schedule).mockReset();
        vi.mocked(cron.validate).mockReset();
        mockLogger = mock<LoggerPort>();
        mockScheduledTask = mock<ScheduledTask>();
        vi.mocked(cron.validate).mockReturnValue(true);
        vi.mocked(cron.schedule).mockReturnValue(mockScheduledTask);
    });

    test('should schedule and start every task', async () => {
        // Given - a worker with one task
        const task = createTask();
        const worker = new NodeCronAdapter(mockLogger, [task]);

        // When - initializing the worker
        await worker.initialize();

        // Then - the task is scheduled on its expression and started, but not run yet
        expect(cron.schedule).toHaveBeenCalledWith('0 * * * *', expect.any(Function), {
            scheduled: false,
        });
        expect(mockScheduledTask.start).toHaveBeenCalledTimes(1);
        expect(task.execute).not.toHaveBeenCalled();
    });

    test('should run a startup task immediately', async () => {
        // Given - a task that runs on startup
        const task = createTask({ executeOnStartup: true });
        const worker = new NodeCronAdapter(mockLogger, [task]);

        // When - initializing the worker
        await worker.initialize();

        // Then - it has already run once
        expect(task.execute).toHaveBeenCalledTimes(1);
    });

    test('should skip a task with an invalid schedule', async () => {
        // Given - a task whose expression does not parse
        vi.mocked(cron.validate).mockReturnValue(false);
        const worker = new NodeCronAdapter(mockLogger, [createTask({ schedule: 'every hour' })]);

        // When - initializing the worker
        await worker.initialize();

        // Then - it is reported and never scheduled
        expect(cron.schedule).not.toHaveBeenCalled();
        expect(mockLogger.error).toHaveBeenCalledWith('task:invalid-schedule', {
            schedule: 'every hour',
            task: 'test-task',
        });
    });

    test('should log a failing run without throwing', async () => {
        // Given - a task that fails when triggered
        const error = new Error('sweep failed');
        const task = createTask({ execute: vi.fn().mockRejectedValue(error) });
        const worker = new NodeCronAdapter(mockLogger, [task]);
        await worker.initialize();

        // When - the schedule fires
        scheduledCallback()();

        // Then - the error is logged
        await vi.waitFor(() => {
            expect(mockLogger.error).toHaveBeenCalledWith('task:error', {
                error,
                task: 'test-task',
            });
        });
    });

    test('should stop every scheduled task', async () => {
        // Given - a running worker with two tasks
        const worker = new NodeCronAdapter(mockLogger, [
            createTask({ name: 'first' }),
            createTask({ name: 'second' }),
        ]);
        await worker.initialize();

        // When - stopping it
        await worker.stop();

        // Then - both cron tasks are stopped
        expect(mockScheduledTask.stop).toHaveBeenCalledTimes(2);
    });
});
