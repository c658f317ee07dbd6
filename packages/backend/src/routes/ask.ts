import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';
import { confidence_label, report_knowledge_gap } from '../services/retrieval.js';
import { compose_answer } from '../services/ai/answer.js';
import { logger } from '../lib/logger.js';
import { error_message } from '../lib/errors.js';
import { parse_or_reject } from './validate.js';
import { ask_schema } from '../schemas/ask.js';

export type AnswerComposer = typeof compose_answer;

export function create_ask_router(engine: CurationEngine, composer: AnswerComposer = compose_answer): Router {
  const router = Router();

  router.post('/ask', async (req, res, next) => {
    try {
      const body = parse_or_reject(ask_schema, req.body, req, res, 'ask');
      if (!body) return;

      const result = await engine.retrieval.retrieve(
        body.question,
        body.timeout_ms !== undefined ? { timeout_ms: body.timeout_ms } : undefined,
      );

      if (result.kind === 'knowledge_gap') {
        try {
          await report_knowledge_gap(engine.notifications, result);
        } catch (error) {
          logger.error('knowledge gap report failed', {
            request_id: req.request_id,
            error: error_message(error),
          });
        }
        const answer = body.compose ? await composer(result.query_text, []) : undefined;
        res.json({ result, answer });
        return;
      }

      const answer = body.compose ? await composer(result.query_text, result.candidates) : undefined;
      res.json({ result, confidence: confidence_label(result.score), answer });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
