import { type MemoryRecord } from '../entities/memory-record.entity.js';
import { type TopicEnum } from '../value-objects/topic.vo.js';
import { type TopicTrend, TrendSnapshot } from '../value-objects/trend-snapshot.vo.js';

export interface TrendWindow {
    now: Date;
    /** Length of the window in milliseconds, ending at `now` */
    windowMs: number;
}

/**
 * Rolls records created within `[now - window, now]` into per-topic counts and mean sentiment.
 * Callers pass non-expired records only.
 */
export function aggregateTrends(
    records: Iterable<MemoryRecord>,
    window: TrendWindow,
): TrendSnapshot {
    if (!Number.isFinite(window.windowMs) || window.windowMs <= 0) {
        throw new Error(`Invalid trend window: ${window.windowMs}ms. Expected a positive duration`);
    }

    const end = window.now.getTime();
    const start = end - window.windowMs;
    const totals = new Map<TopicEnum, { count: number; sum: number }>();

    for (const record of records) {
        const createdAt = record.createdAt.getTime();
        if (createdAt < start || createdAt > end) {
            continue;
        }

        const topic = record.topic.value;
        const total = totals.get(topic) ?? { count: 0, sum: 0 };
        total.count++;
        total.sum += record.sentiment;
        totals.set(topic, total);
    }

    const trends = new Map<TopicEnum, TopicTrend>();
    for (const [topic, { count, sum }] of totals) {
        trends.set(topic, { count, meanSentiment: sum / count });
    }

    return new TrendSnapshot(trends);
}
