import { type MemoryRecord } from '../../../../domain/entities/memory-record.entity.js';
import { type RecordSource } from '../../../../domain/services/similarity-judge.service.js';

export type LoadStatus = 'corrupt' | 'loaded' | 'missing';

export interface LoadResult {
    recordCount: number;
    status: LoadStatus;
}

/**
 * Persistent memory of processed stories, keyed by canonical URL.
 * Records older than the store's retention horizon are treated as absent.
 */
export interface MemoryStorePort extends RecordSource {
    /**
     * Insert a record.
     * @throws DuplicateKeyError when a non-expired record already owns the URL
     */
    add(record: MemoryRecord): Promise<void>;

    /**
     * Lazy, restartable view over the records, expired ones excluded unless asked for
     */
    allRecords(options?: { includeExpired?: boolean }): Iterable<MemoryRecord>;

    /**
     * Whether a non-expired record exists for the URL
     */
    contains(url: string): boolean;

    /**
     * Replace the in-memory records with the persisted ones.
     * A missing or corrupt backing file leaves the store empty.
     */
    load(): Promise<LoadResult>;

    /**
     * Write every record, expired ones included, to the backing file
     */
    persist(): Promise<void>;

    /**
     * Drop every record and return how many were dropped
     */
    reset(): Promise<number>;

    /**
     * Remove records created before `now - horizonMs` and return how many were removed.
     * Records created after `now` are never removed.
     */
    sweep(now: Date, horizonMs: number): Promise<number>;
}
