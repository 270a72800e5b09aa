import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Configuration
import { type MemoryRetentionTaskConfig } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type MemoryFacade } from '../../../../application/facades/memory.facade.js';
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';

/**
 * Periodically purges memory records older than the retention horizon
 */
export class MemoryRetentionTask implements TaskPort {
    public readonly executeOnStartup: boolean;
    public readonly name = 'memory-retention';
    public readonly schedule: string;

    constructor(
        private readonly memory: MemoryFacade,
        private readonly horizonMs: number,
        taskConfig: MemoryRetentionTaskConfig,
        private readonly logger: LoggerPort,
    ) {
        this.executeOnStartup = taskConfig.executeOnStartup;
        this.schedule = taskConfig.schedule;
    }

    async execute(): Promise<void> {
        this.logger.info('Memory retention task started', { horizonMs: this.horizonMs });

        try {
            const removed = await this.memory.sweep(this.horizonMs);
            const { records } = this.memory.stats();

            this.logger.info('Memory retention task finished', { remaining: records, removed });
        } catch (error) {
            this.logger.error('Memory retention task encountered an error', { error });
            throw error;
        }
    }
}
