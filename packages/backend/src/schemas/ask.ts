import { z } from 'zod';

export const ask_schema = z.object({
  question: z.string().trim().min(1).max(2000),
  compose: z.boolean().default(false),
  timeout_ms: z.number().int().min(100).max(60000).optional(),
});
