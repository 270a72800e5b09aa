import { type Context, Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';

import { type MemoryController } from './memory.controller.js';

const readJsonBody = async (c: Context): Promise<unknown> => {
    try {
        return await c.req.json<unknown>();
    } catch (error) {
        throw new HTTPException(400, { cause: error, message: 'Request body must be valid JSON' });
    }
};

export const createMemoryRouter = (memoryController: MemoryController) => {
    const app = new Hono();

    app.post('/candidates/evaluate', async (c) => {
        const response = memoryController.evaluateCandidate(await readJsonBody(c));

        return c.json(response);
    });

    app.post('/records', async (c) => {
        const response = await memoryController.recordAcceptedStory(await readJsonBody(c));

        return c.json(response, response.status === 'recorded' ? 201 : 200);
    });

    app.get('/trends', (c) => {
        const query = c.req.query();

        return c.json(memoryController.getTrends({ windowHours: query.windowHours }));
    });

    app.get('/stats', (c) => c.json(memoryController.getStats()));

    return app;
};
