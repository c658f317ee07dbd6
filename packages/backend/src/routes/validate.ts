import type { Request, Response } from 'express';
import type { z } from 'zod';
import { logger } from '../lib/logger.js';

/**
 * Parses `value` with `schema`. On failure logs the issues, answers 400 and
 * returns null; the handler should return immediately.
 */
export function parse_or_reject<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  req: Request,
  res: Response,
  label: string,
): z.infer<S> | null {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  logger.warn(`${label} validation failed`, {
    request_id: req.request_id,
    error_count: result.error.issues.length,
    issues: result.error.issues.map((i) => ({ path: i.path.join('.'), code: i.code, message: i.message })),
  });
  res.status(400).json({ error: 'Invalid request', details: result.error.issues });
  return null;
}
