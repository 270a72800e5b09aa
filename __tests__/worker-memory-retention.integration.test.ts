import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import {
    cleanupIntegrationContext,
    createIntegrationContext,
    executeRequest,
    executeTask,
    type IntegrationContext,
    startIntegrationContext,
    stopIntegrationContext,
} from './setup/integration.js';

const story = {
    body: 'Volunteers planted two hundred trees along the river bank.',
    title: 'Volunteers plant trees along the river',
    topic: 'general',
    url: 'https://news.example.com/local/trees',
};

/**
 * Integration test for the memory retention task.
 * Scenario: a story recorded more than the seven day horizon ago is forgotten.
 */
describe('Worker memory retention – integration', () => {
    let integrationContext: IntegrationContext;

    beforeAll(async () => {
        integrationContext = await createIntegrationContext();
    });

    afterAll(async () => {
        await cleanupIntegrationContext(integrationContext);
    });

    beforeEach(async () => {
        await startIntegrationContext(integrationContext);
    });

    afterEach(async () => {
        await stopIntegrationContext(integrationContext);
    });

    it('should forget stories older than the retention horizon', async () => {
        // Given – a story recorded eight days ago
        await executeRequest(integrationContext, '/memory/records', {
            body: { candidate: story, generatedTitle: 'Riverside gets greener', sentiment: 0.7 },
            method: 'POST',
        });
        integrationContext.clock.advance({ days: 8 });

        // When
        await executeTask(integrationContext, 'memory-retention');

        // Then
        expect(integrationContext.gateways.memory.stats().records).toBe(0);
        const response = await executeRequest(integrationContext, '/memory/candidates/evaluate', {
            body: story,
            method: 'POST',
        });
        expect(await response.json()).toMatchObject({ shouldProcess: true });
    });

    it('should keep stories within the retention horizon', async () => {
        // Given – a story recorded six days ago
        await executeRequest(integrationContext, '/memory/records', {
            body: { candidate: story, generatedTitle: 'Riverside gets greener', sentiment: 0.7 },
            method: 'POST',
        });
        integrationContext.clock.advance({ days: 6 });

        // When
        await executeTask(integrationContext, 'memory-retention');

        // Then
        expect(integrationContext.gateways.memory.stats().records).toBe(1);
    });
});
