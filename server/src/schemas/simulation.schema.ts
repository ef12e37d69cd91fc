import { z } from 'zod';

export const stateHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(600).default(10),
  summaryOnly: z
    .string()
    .default('false')
    .transform(value => value.toLowerCase() === 'true'),
});

export const crashBodySchema = z.object({
  lane: z.number().int().min(0),
});
