import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

import { daysToMs, hoursToMs } from '../shared/date/durations.js';
import { type LoggerPort } from '../shared/logger/logger.port.js';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import { NodeConfig } from '../infrastructure/inbound/configuration/node-config.js';

// Application
import { MemoryFacade } from '../application/facades/memory.facade.js';
import type { ServerPort } from '../application/ports/inbound/server.port.js';
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { MemoryStorePort } from '../application/ports/outbound/persistence/memory-store.port.js';
import type { ClockPort } from '../application/ports/outbound/time/clock.port.js';
import { EvaluateCandidateUseCase } from '../application/use-cases/memory/evaluate-candidate.use-case.js';
import { GetMemoryStatsUseCase } from '../application/use-cases/memory/get-memory-stats.use-case.js';
import { GetTrendsUseCase } from '../application/use-cases/memory/get-trends.use-case.js';
import { RecordAcceptedStoryUseCase } from '../application/use-cases/memory/record-accepted-story.use-case.js';
import { ResetMemoryUseCase } from '../application/use-cases/memory/reset-memory.use-case.js';
import { SweepMemoryUseCase } from '../application/use-cases/memory/sweep-memory.use-case.js';

// Domain
import { SimilarityJudge } from '../domain/services/similarity-judge.service.js';

// Infrastructure
import { HonoServer } from '../infrastructure/inbound/server/hono.server.js';
import { MemoryController } from '../infrastructure/inbound/server/memory/memory.controller.js';
import { MemoryRetentionTask } from '../infrastructure/inbound/worker/memory/memory-retention.task.js';
import { NodeCronAdapter } from '../infrastructure/inbound/worker/node-cron.adapter.js';
import { PinoLoggerAdapter } from '../infrastructure/outbound/logging/pino-logger.adapter.js';
import { JsonFileMemoryStore } from '../infrastructure/outbound/persistence/memory/json-file-memory.store.js';
import { SystemClock } from '../infrastructure/outbound/time/system.clock.js';

/**
 * Outbound adapters
 */
const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLoggerAdapter({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const clockFactory = (overrides?: ContainerOverrides) =>
    Injectable('Clock', (): ClockPort => overrides?.clock ?? new SystemClock());

const memoryStoreFactory = Injectable(
    'MemoryStore',
    ['Configuration', 'Clock', 'Logger'] as const,
    (config: ConfigurationPort, clock: ClockPort, logger: LoggerPort): MemoryStorePort => {
        logger.info('Initializing Memory store', { store: 'JsonFile' });
        return new JsonFileMemoryStore(
            {
                filePath: config.getOutboundConfiguration().persistence.memoryFile,
                retentionHorizonMs: daysToMs(
                    config.getInboundConfiguration().memory.retention.horizonDays,
                ),
            },
            clock,
            logger,
        );
    },
);

/**
 * Domain services
 */
const similarityJudgeFactory = Injectable(
    'SimilarityJudge',
    ['Configuration'] as const,
    (config: ConfigurationPort) =>
        new SimilarityJudge(config.getInboundConfiguration().memory.deduplication),
);

/**
 * Use case factories
 */
const evaluateCandidateUseCaseFactory = Injectable(
    'EvaluateCandidate',
    ['SimilarityJudge', 'MemoryStore', 'Logger'] as const,
    (similarityJudge: SimilarityJudge, memoryStore: MemoryStorePort, logger: LoggerPort) =>
        new EvaluateCandidateUseCase(similarityJudge, memoryStore, logger),
);

const recordAcceptedStoryUseCaseFactory = Injectable(
    'RecordAcceptedStory',
    ['MemoryStore', 'Clock', 'Logger', 'Configuration'] as const,
    (
        memoryStore: MemoryStorePort,
        clock: ClockPort,
        logger: LoggerPort,
        config: ConfigurationPort,
    ) =>
        new RecordAcceptedStoryUseCase(memoryStore, clock, logger, {
            persistOnWrite: config.getOutboundConfiguration().persistence.persistOnWrite,
        }),
);

const getTrendsUseCaseFactory = Injectable(
    'GetTrends',
    ['MemoryStore', 'Clock', 'Configuration'] as const,
    (memoryStore: MemoryStorePort, clock: ClockPort, config: ConfigurationPort) =>
        new GetTrendsUseCase(
            memoryStore,
            clock,
            hoursToMs(config.getInboundConfiguration().memory.trends.defaultWindowHours),
        ),
);

const sweepMemoryUseCaseFactory = Injectable(
    'SweepMemory',
    ['MemoryStore', 'Clock', 'Logger', 'Configuration'] as const,
    (
        memoryStore: MemoryStorePort,
        clock: ClockPort,
        logger: LoggerPort,
        config: ConfigurationPort,
    ) =>
        new SweepMemoryUseCase(memoryStore, clock, logger, {
            defaultHorizonMs: daysToMs(
                config.getInboundConfiguration().memory.retention.horizonDays,
            ),
            persistOnWrite: config.getOutboundConfiguration().persistence.persistOnWrite,
        }),
);

const getMemoryStatsUseCaseFactory = Injectable(
    'GetMemoryStats',
    ['MemoryStore'] as const,
    (memoryStore: MemoryStorePort) => new GetMemoryStatsUseCase(memoryStore),
);

const resetMemoryUseCaseFactory = Injectable(
    'ResetMemory',
    ['MemoryStore', 'Logger', 'Configuration'] as const,
    (memoryStore: MemoryStorePort, logger: LoggerPort, config: ConfigurationPort) =>
        new ResetMemoryUseCase(memoryStore, logger, {
            persistOnWrite: config.getOutboundConfiguration().persistence.persistOnWrite,
        }),
);

/**
 * Facade
 */
const memoryFactory = Injectable(
    'Memory',
    [
        'MemoryStore',
        'EvaluateCandidate',
        'RecordAcceptedStory',
        'GetTrends',
        'SweepMemory',
        'GetMemoryStats',
        'ResetMemory',
        'Logger',
    ] as const,
    (
        memoryStore: MemoryStorePort,
        evaluateCandidate: EvaluateCandidateUseCase,
        recordAcceptedStory: RecordAcceptedStoryUseCase,
        getTrends: GetTrendsUseCase,
        sweepMemory: SweepMemoryUseCase,
        getMemoryStats: GetMemoryStatsUseCase,
        resetMemory: ResetMemoryUseCase,
        logger: LoggerPort,
    ) =>
        new MemoryFacade(
            memoryStore,
            evaluateCandidate,
            recordAcceptedStory,
            getTrends,
            sweepMemory,
            getMemoryStats,
            resetMemory,
            logger,
        ),
);

/**
 * Controller factories
 */
const controllersFactory = Injectable(
    'Controllers',
    ['Memory', 'Clock'] as const,
    (memory: MemoryFacade, clock: ClockPort) => ({
        memory: new MemoryController(memory, clock),
    }),
);

/**
 * Task factories
 */
const tasksFactory = Injectable(
    'Tasks',
    ['Memory', 'Configuration', 'Logger'] as const,
    (memory: MemoryFacade, configuration: ConfigurationPort, logger: LoggerPort): TaskPort[] => {
        const inbound = configuration.getInboundConfiguration();

        return [
            new MemoryRetentionTask(
                memory,
                daysToMs(inbound.memory.retention.horizonDays),
                inbound.tasks.memoryRetention,
                logger,
            ),
        ];
    },
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', () => new NodeConfig(nodeConfiguration, overrides));

const serverFactory = Injectable(
    'Server',
    ['Logger', 'Controllers'] as const,
    (logger: LoggerPort, controllers: { memory: MemoryController }): ServerPort => {
        logger.info('Initializing Server', { implementation: 'Hono' });
        return new HonoServer(logger, controllers.memory);
    },
);

const workerFactory = Injectable(
    'Worker',
    ['Logger', 'Tasks'] as const,
    (logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        logger.info('Initializing Worker', { implementation: 'NodeCron' });
        return new NodeCronAdapter(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = {
    clock?: ClockPort;
    memoryFile?: string;
};

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(clockFactory(overrides))
        .provides(memoryStoreFactory)
        // Domain services
        .provides(similarityJudgeFactory)
        // Use cases
        .provides(evaluateCandidateUseCaseFactory)
        .provides(recordAcceptedStoryUseCaseFactory)
        .provides(getTrendsUseCaseFactory)
        .provides(sweepMemoryUseCaseFactory)
        .provides(getMemoryStatsUseCaseFactory)
        .provides(resetMemoryUseCaseFactory)
        .provides(memoryFactory)
        // Controllers and tasks
        .provides(controllersFactory)
        .provides(tasksFactory)
        // Inbound adapters
        .provides(serverFactory)
        .provides(workerFactory);
