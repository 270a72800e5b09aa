/**
 * A recurring job run by the worker
 */
export interface TaskPort {
    /**
     * Runs one occurrence of the task; a rejection is logged by the worker
     */
    execute: () => Promise<void>;

    /**
     * Also run once as soon as the worker starts
     * @default false
     */
    executeOnStartup?: boolean;

    name: string;

    /**
     * Cron expression, e.g. `0 * * * *` for hourly
     */
    schedule: string;
}

export interface WorkerPort {
    /**
     * Schedule every registered task
     */
    initialize(): Promise<void>;

    /**
     * Cancel every scheduled task; occurrences already running are left to finish
     */
    stop(): Promise<void>;
}
