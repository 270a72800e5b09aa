import { createContainer } from './di/container.js';

const start = async () => {
    const container = createContainer();
    const logger = container.get('Logger');
    const config = container.get('Configuration');
    const memory = container.get('Memory');
    const server = container.get('Server');
    const worker = container.get('Worker');

    const shutdown = async (signal: string) => {
        logger.info('app:shutdown', { signal });

        try {
            await worker.stop();
            await server.stop();
        } finally {
            await memory.flush();
        }

        process.exit(0);
    };

    try {
        const inbound = config.getInboundConfiguration();
        logger.info('app:start', { env: inbound.env });

        const { host, port } = inbound.http;

        await memory.initialize({ resetOnStartup: inbound.memory.retention.resetOnStartup });
        await worker.initialize();
        await server.start({
            host,
            port,
        });

        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                shutdown(signal).catch((error: unknown) => {
                    logger.error('app:shutdown:error', { error });
                    process.exit(1);
                });
            });
        }

        logger.info('app:ready', { host, port });
    } catch (error) {
        logger.error('app:error', { error });
        process.exit(1);
    }
};

void start();
