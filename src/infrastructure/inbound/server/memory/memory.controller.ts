// Application
import { type MemoryFacade } from '../../../../application/facades/memory.facade.js';
import { type ClockPort } from '../../../../application/ports/outbound/time/clock.port.js';
import { type RecordAcceptedResult } from '../../../../application/use-cases/memory/record-accepted-story.use-case.js';

import { type GetTrendsHttpQuery, MemoryRequestHandler } from './memory-request.handler.js';
import {
    type CandidateVerdictResponse,
    type MemoryStatsResponse,
    MemoryResponsePresenter,
    type TrendsResponse,
} from './memory-response.presenter.js';

/**
 * Orchestrates HTTP request handling for the /memory endpoints
 * Delegates request validation to the handler and formatting to the presenter
 */
export class MemoryController {
    private readonly requestHandler: MemoryRequestHandler;
    private readonly responsePresenter: MemoryResponsePresenter;

    constructor(
        private readonly memory: MemoryFacade,
        private readonly clock: ClockPort,
    ) {
        this.requestHandler = new MemoryRequestHandler();
        this.responsePresenter = new MemoryResponsePresenter();
    }

    evaluateCandidate(rawBody: unknown): CandidateVerdictResponse {
        const candidate = this.requestHandler.handleCandidate(rawBody, this.clock.now());

        return this.responsePresenter.presentVerdict(this.memory.evaluate(candidate));
    }

    getStats(): MemoryStatsResponse {
        return this.responsePresenter.presentStats(this.memory.stats());
    }

    getTrends(rawQuery: GetTrendsHttpQuery): TrendsResponse {
        const { windowMs } = this.requestHandler.handleTrendsQuery(rawQuery);

        return this.responsePresenter.presentTrends(this.memory.trends(windowMs));
    }

    async recordAcceptedStory(rawBody: unknown): Promise<RecordAcceptedResult> {
        const { candidate, generatedTitle, sentiment } = this.requestHandler.handleAcceptedStory(
            rawBody,
            this.clock.now(),
        );

        return this.memory.recordAccepted(candidate, generatedTitle, sentiment);
    }
}
