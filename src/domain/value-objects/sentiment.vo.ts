import { z } from 'zod/v4';

export const sentimentSchema = z
    .number()
    .min(-1)
    .max(1)
    .describe('Compound sentiment score, from -1 (negative) to 1 (positive).');
