import { type TopicEnum } from './topic.vo.js';

export interface TopicTrend {
    count: number;
    meanSentiment: number;
}

/**
 * @description Per-topic record counts and mean sentiment over a time window.
 * Topics without any contributing record are absent.
 */
export class TrendSnapshot {
    private readonly trends: ReadonlyMap<TopicEnum, TopicTrend>;

    constructor(trends: Map<TopicEnum, TopicTrend> = new Map()) {
        this.trends = new Map(trends);
    }

    public get(topic: TopicEnum): TopicTrend | undefined {
        return this.trends.get(topic);
    }

    public isEmpty(): boolean {
        return this.trends.size === 0;
    }

    public topics(): TopicEnum[] {
        return [...this.trends.keys()].sort();
    }

    public toJSON(): Partial<Record<TopicEnum, TopicTrend>> {
        const json: Partial<Record<TopicEnum, TopicTrend>> = {};

        for (const topic of this.topics()) {
            const trend = this.trends.get(topic);
            if (trend) {
                json[topic] = { ...trend };
            }
        }

        return json;
    }
}
