import { HTTPException } from 'hono/http-exception';
import { z } from 'zod/v4';

import { HOUR_MS } from '../../../../shared/date/durations.js';

// Application
import { type AcceptedStory } from '../../../../application/use-cases/memory/record-accepted-story.use-case.js';

// Domain
import { CandidateStory } from '../../../../domain/entities/candidate-story.entity.js';
import { Topic } from '../../../../domain/value-objects/topic.vo.js';

const MAX_WINDOW_HOURS = 24 * 365;

/**
 * Raw HTTP query parameters of GET /memory/trends
 */
export interface GetTrendsHttpQuery {
    windowHours?: string;
}

/**
 * Validates a candidate story payload; `fetchedAt` defaults to the time of the request
 */
const candidateBodySchema = z.object({
    body: z.string().optional().default(''),
    fetchedAt: z.iso.datetime().optional(),
    title: z.string().trim().min(1),
    topic: z.string().trim().min(1),
    url: z.string().trim().min(1),
});

const acceptedStoryBodySchema = z.object({
    candidate: candidateBodySchema,
    generatedTitle: z.string().trim().min(1),
    sentiment: z.number().min(-1).max(1),
});

const trendsQuerySchema = z.object({
    windowHours: z.coerce.number().positive().max(MAX_WINDOW_HOURS).optional(),
});

type CandidateBody = z.infer<typeof candidateBodySchema>;

const toCandidateStory = (body: CandidateBody, receivedAt: Date): CandidateStory =>
    new CandidateStory({
        body: body.body,
        fetchedAt: body.fetchedAt ? new Date(body.fetchedAt) : receivedAt,
        title: body.title,
        topic: new Topic(body.topic),
        url: body.url,
    });

const invalid = (issues: z.ZodError['issues']): HTTPException =>
    new HTTPException(422, {
        cause: { details: issues },
        message: 'Invalid request parameters',
    });

/**
 * Validates and transforms HTTP input of the /memory routes into domain objects
 */
export class MemoryRequestHandler {
    /**
     * @throws HTTPException with 422 status for validation errors
     */
    handleAcceptedStory(rawBody: unknown, receivedAt: Date): AcceptedStory {
        const result = acceptedStoryBodySchema.safeParse(rawBody);

        if (!result.success) {
            throw invalid(result.error.issues);
        }

        return {
            candidate: toCandidateStory(result.data.candidate, receivedAt),
            generatedTitle: result.data.generatedTitle,
            sentiment: result.data.sentiment,
        };
    }

    /**
     * @throws HTTPException with 422 status for validation errors
     */
    handleCandidate(rawBody: unknown, receivedAt: Date): CandidateStory {
        const result = candidateBodySchema.safeParse(rawBody);

        if (!result.success) {
            throw invalid(result.error.issues);
        }

        return toCandidateStory(result.data, receivedAt);
    }

    /**
     * @throws HTTPException with 422 status for validation errors
     */
    handleTrendsQuery(rawQuery: GetTrendsHttpQuery): { windowMs?: number } {
        const result = trendsQuerySchema.safeParse(rawQuery);

        if (!result.success) {
            throw invalid(result.error.issues);
        }

        const { windowHours } = result.data;
        return { windowMs: windowHours === undefined ? undefined : windowHours * HOUR_MS };
    }
}
