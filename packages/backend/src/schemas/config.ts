import { z } from 'zod';

export const config_param_schema = z.object({
  key: z.string().trim().min(1).max(100),
});

export const set_config_schema = z.object({
  value: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
});
