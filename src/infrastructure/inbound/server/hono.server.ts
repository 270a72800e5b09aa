import { serve } from '@hono/node-server';
import { Hono } from 'hono';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Application
import {
    type ServerConfiguration,
    type ServerPort,
} from '../../../application/ports/inbound/server.port.js';

import { createErrorHandlerMiddleware } from './error-handler.middleware.js';
import { createHealthRouter } from './health/health.routes.js';
import { type MemoryController } from './memory/memory.controller.js';
import { createMemoryRouter } from './memory/memory.routes.js';

export class HonoServer implements ServerPort {
    private app: Hono;
    private server: null | ReturnType<typeof serve> = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly memoryController: MemoryController,
    ) {
        this.app = new Hono();
        this.setupGlobalMiddleware();
        this.registerRoutes();
    }

    public async request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response> {
        const body = options?.body;
        const init: RequestInit = {
            body: typeof body === 'object' ? JSON.stringify(body) : body,
            headers: options?.headers,
            method: options?.method,
        };
        return this.app.request(path, init);
    }

    public async start(config: ServerConfiguration): Promise<void> {
        return new Promise((resolve) => {
            this.logger.debug('server:start', { host: config.host, port: config.port });

            this.server = serve(
                { fetch: this.app.fetch, hostname: config.host, port: config.port },
                (info) => {
                    this.logger.info('server:listening', { host: config.host, port: info.port });
                    resolve();
                },
            );
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;

        this.logger.info('server:stop');
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        this.logger.info('server:stopped');
    }

    private registerRoutes(): void {
        this.app.route('/', createHealthRouter());
        this.app.route('/memory', createMemoryRouter(this.memoryController));
    }

    private setupGlobalMiddleware(): void {
        this.app.onError(createErrorHandlerMiddleware(this.logger));
    }
}
