import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { type CandidateStory } from '../../../domain/entities/candidate-story.entity.js';
import {
    type DuplicateVerdict,
    type SimilarityJudge,
} from '../../../domain/services/similarity-judge.service.js';

// Ports
import { type MemoryStorePort } from '../../ports/outbound/persistence/memory-store.port.js';

/**
 * Use case for deciding whether a fetched story still needs to be processed
 */
export class EvaluateCandidateUseCase {
    constructor(
        private readonly similarityJudge: SimilarityJudge,
        private readonly memoryStore: MemoryStorePort,
        private readonly logger: LoggerPort,
    ) {}

    public execute(candidate: CandidateStory): DuplicateVerdict {
        const verdict = this.similarityJudge.judge(candidate, this.memoryStore);

        if (verdict.duplicate) {
            this.logger.debug('memory:candidate:duplicate', {
                matchedUrl: verdict.matchedUrl,
                reason: verdict.reason,
                similarity: verdict.similarity,
                url: candidate.url,
            });
        } else {
            this.logger.debug('memory:candidate:new', {
                topic: candidate.topic.toString(),
                url: candidate.url,
            });
        }

        return verdict;
    }
}
