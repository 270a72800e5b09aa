import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';

import type { LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { InvalidRecordError } from '../../../domain/errors/memory.errors.js';

/**
 * Creates a global error handling middleware for Hono
 * Catches all unhandled errors and returns appropriate HTTP responses
 */
export const createErrorHandlerMiddleware = (logger: LoggerPort) => {
    return async (err: Error, c: Context) => {
        // Handle HTTP exceptions (like validation errors)
        if (err instanceof HTTPException) {
            logger.warn('http:rejected', {
                error: err.message,
                path: c.req.path,
                status: err.status,
            });
            return c.json({ error: err.message }, err.status);
        }

        if (err instanceof InvalidRecordError) {
            logger.warn('http:invalid-record', { issues: err.issues, path: c.req.path });
            return c.json({ details: err.issues, error: err.message }, 422);
        }

        logger.error('http:error', { error: err.message, path: c.req.path, stack: err.stack });

        // Handle all other errors as 500 Internal Server Error
        return c.json({ error: 'Internal server error' }, 500);
    };
};
