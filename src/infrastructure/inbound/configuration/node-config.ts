import { z } from 'zod/v4';

import { loggerLevelSchema } from '../../../shared/logger/logger.port.js';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        http: z.object({
            host: z.string(),
            port: z.coerce.number().int().positive(),
        }),
        logger: z.object({
            level: loggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
        memory: z.object({
            deduplication: z.object({
                minTitleTokens: z.coerce.number().int().min(1),
                titleSimilarityThreshold: z.coerce.number().gt(0).max(1),
            }),
            retention: z.object({
                horizonDays: z.coerce.number().positive(),
                resetOnStartup: z.boolean().optional().default(false),
            }),
            trends: z.object({
                defaultWindowHours: z.coerce.number().positive(),
            }),
        }),
        tasks: z.object({
            memoryRetention: z.object({
                executeOnStartup: z.boolean().optional().default(false),
                schedule: z.string().min(1),
            }),
        }),
    }),
    outbound: z.object({
        persistence: z.object({
            memoryFile: z.string().min(1),
            persistOnWrite: z.boolean(),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: { memoryFile?: string }) {
        // Parse and validate first
        const parsed = configurationSchema.parse(configurationInput);

        // Apply override after parsing
        if (overrides?.memoryFile) {
            parsed.outbound.persistence.memoryFile = overrides.memoryFile;
        }

        this.configuration = parsed;
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
