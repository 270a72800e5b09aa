import { HOUR_MS } from '../../../../shared/date/durations.js';

// Application
import { type MemoryStats } from '../../../../application/use-cases/memory/get-memory-stats.use-case.js';
import { type TrendReport } from '../../../../application/use-cases/memory/get-trends.use-case.js';

// Domain
import {
    type DuplicateReason,
    type DuplicateVerdict,
} from '../../../../domain/services/similarity-judge.service.js';
import { type TopicEnum } from '../../../../domain/value-objects/topic.vo.js';
import { type TopicTrend } from '../../../../domain/value-objects/trend-snapshot.vo.js';

export type CandidateVerdictResponse = {
    matchedUrl: null | string;
    reason: DuplicateReason | null;
    shouldProcess: boolean;
    similarity: null | number;
};

export type TrendsResponse = {
    generatedAt: string;
    topics: Partial<Record<TopicEnum, TopicTrend>>;
    windowHours: number;
};

export type MemoryStatsResponse = {
    newestRecordAt: null | string;
    oldestRecordAt: null | string;
    records: number;
    titles: number;
    topicTrends: Partial<Record<TopicEnum, number>>;
    urls: number;
};

/**
 * Formats content memory results as HTTP response bodies
 */
export class MemoryResponsePresenter {
    presentStats(stats: MemoryStats): MemoryStatsResponse {
        return {
            newestRecordAt: stats.newestRecordAt?.toISOString() ?? null,
            oldestRecordAt: stats.oldestRecordAt?.toISOString() ?? null,
            records: stats.records,
            titles: stats.titles,
            topicTrends: stats.topicTrends,
            urls: stats.urls,
        };
    }

    presentTrends(report: TrendReport): TrendsResponse {
        return {
            generatedAt: report.generatedAt.toISOString(),
            topics: report.snapshot.toJSON(),
            windowHours: report.windowMs / HOUR_MS,
        };
    }

    presentVerdict(verdict: DuplicateVerdict): CandidateVerdictResponse {
        if (!verdict.duplicate) {
            return { matchedUrl: null, reason: null, shouldProcess: true, similarity: null };
        }

        return {
            matchedUrl: verdict.matchedUrl,
            reason: verdict.reason,
            shouldProcess: false,
            similarity: verdict.similarity,
        };
    }
}
