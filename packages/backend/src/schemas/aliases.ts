import { z } from 'zod';

export const alias_param_schema = z.object({
  trigger: z.string().trim().min(1).max(100),
});

export const set_alias_schema = z.object({
  replacement: z.string().trim().min(1).max(500),
});
