import { type LoggerLevel } from '../../../shared/logger/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    http: {
        host: string;
        port: number;
    };
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    memory: MemoryConfigurationPort;
    tasks: {
        memoryRetention: MemoryRetentionTaskConfig;
    };
}

/**
 * Deduplication, retention and trend settings of the content memory
 */
export interface MemoryConfigurationPort {
    deduplication: {
        minTitleTokens: number;
        titleSimilarityThreshold: number;
    };
    retention: {
        horizonDays: number;
        resetOnStartup: boolean;
    };
    trends: {
        defaultWindowHours: number;
    };
}

/**
 * Outbound configuration (defined by external services)
 */
export interface OutboundConfigurationPort {
    persistence: {
        memoryFile: string;
        persistOnWrite: boolean;
    };
}

/**
 * Memory retention task configuration
 */
export interface MemoryRetentionTaskConfig {
    executeOnStartup: boolean;
    schedule: string;
}
