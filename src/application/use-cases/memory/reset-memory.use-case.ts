import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';

/**
 * Use case for forgetting every processed story
 */
export class ResetMemoryUseCase {
    constructor(
        private readonly memoryStore: MemoryStorePort,
        private readonly logger: LoggerPort,
        private readonly options: { persistOnWrite: boolean },
    ) {}

    public async execute(): Promise<number> {
        const removed = await this.memoryStore.reset();
        this.logger.info('memory:reset', { removed });

        if (this.options.persistOnWrite) {
            try {
                await this.memoryStore.persist();
            } catch (error) {
                this.logger.error('memory:persist:error', { error });
            }
        }

        return removed;
    }
}
