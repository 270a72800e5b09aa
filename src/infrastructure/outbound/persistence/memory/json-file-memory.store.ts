import { mkdir, open, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import pLimit from 'p-limit';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Application
import {
    type LoadResult,
    type MemoryStorePort,
} from '../../../../application/ports/outbound/persistence/memory-store.port.js';
import { type ClockPort } from '../../../../application/ports/outbound/time/clock.port.js';

// Domain
import { type MemoryRecord } from '../../../../domain/entities/memory-record.entity.js';
import { CorruptStateError, DuplicateKeyError } from '../../../../domain/errors/memory.errors.js';
import { canonicalizeUrl } from '../../../../domain/value-objects/story-url.vo.js';

import { JsonMemoryRecordMapper, memoryStateSchema } from './json-memory-record.mapper.js';

// Constants
const FILE_ENCODING = 'utf-8';
const JSON_INDENT = 2;

export interface JsonFileMemoryStoreOptions {
    filePath: string;
    retentionHorizonMs: number;
}

const isMissingFileError = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Memory store held in a map and persisted as a single JSON document.
 * Mutations run one at a time through one limiter and file writes through another,
 * so a slow flush never holds up `add` or `sweep`.
 */
export class JsonFileMemoryStore implements MemoryStorePort {
    private readonly mutations = pLimit(1);
    private records = new Map<string, MemoryRecord>();
    private readonly writes = pLimit(1);

    constructor(
        private readonly options: JsonFileMemoryStoreOptions,
        private readonly clock: ClockPort,
        private readonly logger: LoggerPort,
    ) {
        this.logger.info('adapter:init', {
            component: 'JsonFileMemoryStore',
            filePath: this.options.filePath,
            retentionHorizonMs: this.options.retentionHorizonMs,
        });
    }

    public add(record: MemoryRecord): Promise<void> {
        return this.mutations(() => {
            const existing = this.records.get(record.url);

            if (existing && !this.isExpired(existing, this.clock.now())) {
                throw new DuplicateKeyError(record.url);
            }

            if (existing) {
                this.logger.debug('memory:record:replace-expired', {
                    expiredAt: existing.createdAt.toISOString(),
                    url: record.url,
                });
            }

            this.records.set(record.url, record);
        });
    }

    public allRecords(options?: { includeExpired?: boolean }): Iterable<MemoryRecord> {
        const includeExpired = options?.includeExpired ?? false;
        return {
            [Symbol.iterator]: () => this.iterate(includeExpired),
        };
    }

    public contains(url: string): boolean {
        const record = this.records.get(canonicalizeUrl(url));
        return record !== undefined && !this.isExpired(record, this.clock.now());
    }

    public load(): Promise<LoadResult> {
        return this.mutations(async () => {
            const filePath = this.options.filePath;

            try {
                const records = await this.readRecords();

                if (!records) {
                    this.records = new Map();
                    this.logger.warn('memory:load:missing', { filePath });
                    return { recordCount: 0, status: 'missing' };
                }

                this.records = records;
                this.logger.info('memory:load', { filePath, recordCount: records.size });
                return { recordCount: records.size, status: 'loaded' };
            } catch (error) {
                this.records = new Map();
                this.logger.warn('memory:load:corrupt', { error, filePath });
                return { recordCount: 0, status: 'corrupt' };
            }
        });
    }

    public async persist(): Promise<void> {
        const state = JsonMemoryRecordMapper.toState(this.records.values(), this.clock.now());
        const content = JSON.stringify(state, null, JSON_INDENT);
        const recordCount = Object.keys(state.records).length;

        await this.writes(() => this.writeContent(content));

        this.logger.debug('memory:persist', { filePath: this.options.filePath, recordCount });
    }

    public reset(): Promise<number> {
        return this.mutations(() => {
            const removed = this.records.size;
            this.records = new Map();
            return removed;
        });
    }

    public sweep(now: Date, horizonMs: number): Promise<number> {
        if (!Number.isFinite(horizonMs) || horizonMs < 0) {
            return Promise.reject(
                new Error(`Invalid retention horizon: ${horizonMs}ms. Expected a duration >= 0`),
            );
        }

        return this.mutations(() => {
            const nowMs = now.getTime();
            const cutoff = nowMs - horizonMs;
            let removed = 0;

            for (const [url, record] of this.records) {
                const createdAt = record.createdAt.getTime();

                // Records newer than the sweep's own clock reading belong to a later add
                if (createdAt < cutoff && createdAt <= nowMs) {
                    this.records.delete(url);
                    removed++;
                }
            }

            return removed;
        });
    }

    private isExpired(record: MemoryRecord, now: Date): boolean {
        return record.isExpired(now, this.options.retentionHorizonMs);
    }

    private *iterate(includeExpired: boolean): Generator<MemoryRecord> {
        const now = this.clock.now();

        for (const record of this.records.values()) {
            if (includeExpired || !this.isExpired(record, now)) {
                yield record;
            }
        }
    }

    /**
     * @returns null when there is no backing file yet
     * @throws CorruptStateError when the file cannot be read or decoded
     */
    private async readRecords(): Promise<Map<string, MemoryRecord> | null> {
        const filePath = this.options.filePath;
        let content: string;

        try {
            const handle = await open(filePath, 'r');
            try {
                content = await handle.readFile({ encoding: FILE_ENCODING });
            } finally {
                await handle.close();
            }
        } catch (error) {
            if (isMissingFileError(error)) {
                return null;
            }
            throw new CorruptStateError(filePath, { cause: error });
        }

        try {
            const state = memoryStateSchema.parse(JSON.parse(content));
            const records = new Map<string, MemoryRecord>();

            for (const [url, persisted] of Object.entries(state.records)) {
                const record = JsonMemoryRecordMapper.toDomain(url, persisted);
                records.set(record.url, record);
            }

            return records;
        } catch (error) {
            throw new CorruptStateError(filePath, { cause: error });
        }
    }

    /**
     * Writes beside the target and renames over it, so readers only ever see a complete file
     */
    private async writeContent(content: string): Promise<void> {
        const filePath = this.options.filePath;
        const temporaryPath = `${filePath}.${process.pid}.tmp`;

        await mkdir(dirname(filePath), { recursive: true });

        try {
            const handle = await open(temporaryPath, 'w');
            try {
                await handle.writeFile(content, { encoding: FILE_ENCODING });
                await handle.sync();
            } finally {
                await handle.close();
            }

            await rename(temporaryPath, filePath);
        } catch (error) {
            await rm(temporaryPath, { force: true });
            throw error;
        }
    }
}
