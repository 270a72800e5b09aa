/**
 * Server configuration
 */
export interface ServerConfiguration {
    host: string;
    port: number;
}

/**
 * HTTP server port
 */
export interface ServerPort {
    /**
     * Dispatch a request to the application without opening a socket
     */
    request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response>;

    /**
     * Start listening for requests
     */
    start(config: ServerConfiguration): Promise<void>;

    /**
     * Stop the server
     */
    stop(): Promise<void>;
}
