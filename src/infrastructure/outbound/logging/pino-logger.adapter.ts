import { type Logger, pino } from 'pino';

import {
    type LoggerLevel,
    type LoggerMetadata,
    type LoggerPort,
} from '../../../shared/logger/logger.port.js';

export interface PinoLoggerConfiguration {
    level: LoggerLevel;
    prettyPrint: boolean;
}

/**
 * Logger backed by pino, pretty-printed through pino-pretty when asked to
 */
export class PinoLoggerAdapter implements LoggerPort {
    private readonly logger: Logger;

    constructor(configuration: PinoLoggerConfiguration, logger?: Logger) {
        this.logger =
            logger ??
            pino({
                level: configuration.level,
                serializers: { error: pino.stdSerializers.err },
                transport: configuration.prettyPrint
                    ? { options: { colorize: true }, target: 'pino-pretty' }
                    : undefined,
            });
    }

    public debug(message: string, metadata?: LoggerMetadata): void {
        this.logger.debug(metadata ?? {}, message);
    }

    public error(message: string, metadata?: LoggerMetadata): void {
        this.logger.error(metadata ?? {}, message);
    }

    public info(message: string, metadata?: LoggerMetadata): void {
        this.logger.info(metadata ?? {}, message);
    }

    public warn(message: string, metadata?: LoggerMetadata): void {
        this.logger.warn(metadata ?? {}, message);
    }
}
