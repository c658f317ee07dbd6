import { z } from 'zod';

export const visibility_schema = z.enum(['public', 'sensitive']);

export const fact_id_param_schema = z.object({
  id: z.coerce.number().int().positive(),
});

export const ingest_fact_schema = z.object({
  topic: z.string().trim().min(1).max(200),
  content: z.string().trim().min(1).max(4000),
  visibility: visibility_schema.default('public'),
  author_id: z.string().min(1).optional(),
  skip_duplicate_check: z.boolean().optional(),
});

export const replace_fact_schema = z.object({
  topic: z.string().trim().min(1).max(200),
  content: z.string().trim().min(1).max(4000),
  visibility: visibility_schema.optional(),
  editor_id: z.string().min(1).optional(),
});

export const list_facts_query_schema = z.object({
  topic: z.string().trim().min(1).optional(),
  cursor: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const topic_search_query_schema = z.object({
  q: z.string().default(''),
  limit: z.coerce.number().int().min(1).max(25).default(25),
});

export const forget_query_schema = z.object({
  actor_id: z.string().min(1).optional(),
});

export const forget_topic_query_schema = forget_query_schema.extend({
  topic: z.string().trim().min(1),
});

export const vote_schema = z.object({
  direction: z.enum(['up', 'down']),
});

export const visibility_update_schema = z.object({
  visibility: visibility_schema,
});
