import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';
import { type ClockPort } from '../../ports/outbound/time/clock.port.js';

/**
 * Use case for purging records older than the retention horizon
 */
export class SweepMemoryUseCase {
    constructor(
        private readonly memoryStore: MemoryStorePort,
        private readonly clock: ClockPort,
        private readonly logger: LoggerPort,
        private readonly options: { defaultHorizonMs: number; persistOnWrite: boolean },
    ) {}

    public async execute(horizonMs: number = this.options.defaultHorizonMs): Promise<number> {
        const now = this.clock.now();
        const removed = await this.memoryStore.sweep(now, horizonMs);

        this.logger.info('memory:sweep', {
            cutoff: new Date(now.getTime() - horizonMs).toISOString(),
            removed,
        });

        if (removed > 0 && this.options.persistOnWrite) {
            try {
                await this.memoryStore.persist();
            } catch (error) {
                this.logger.error('memory:persist:error', { error });
            }
        }

        return removed;
    }
}
