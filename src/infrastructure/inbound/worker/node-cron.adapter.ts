import cron, { type ScheduledTask } from 'node-cron';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';

export class NodeCronAdapter implements WorkerPort {
    private readonly scheduledTasks: ScheduledTask[] = [];

    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
    ) {}

    async initialize(): Promise<void> {
        this.logger.debug('worker:start', { tasks: this.tasks.length });

        for (const task of this.tasks) {
            this.scheduleTask(task);
        }

        this.logger.debug('worker:ready');
    }

    async stop(): Promise<void> {
        this.logger.info('worker:stop', { runningTasks: this.scheduledTasks.length });

        for (const task of this.scheduledTasks) {
            task.stop();
        }

        this.scheduledTasks.length = 0;
        this.logger.info('worker:stopped');
    }

    /**
     * Schedules an individual cron task; failures are logged and never escape the timer.
     */
    private scheduleTask(task: TaskPort): void {
        if (!cron.validate(task.schedule)) {
            this.logger.error('task:invalid-schedule', {
                schedule: task.schedule,
                task: task.name,
            });
            return;
        }

        this.logger.debug('task:schedule', { schedule: task.schedule, task: task.name });

        const executeSafely = async (): Promise<void> => {
            const start = Date.now();
            this.logger.debug('task:start', { task: task.name });

            try {
                await task.execute();
                this.logger.info('task:complete', {
                    durationMs: Date.now() - start,
                    task: task.name,
                });
            } catch (error) {
                this.logger.error('task:error', { error, task: task.name });
            }
        };

        const cronTask = cron.schedule(
            task.schedule,
            () => {
                void executeSafely();
            },
            { scheduled: false },
        );

        this.scheduledTasks.push(cronTask);

        if (task.executeOnStartup) {
            this.logger.debug('task:startup-run', { task: task.name });
            void executeSafely();
        }

        cronTask.start();
    }
}
