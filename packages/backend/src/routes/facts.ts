import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';
import { to_summary } from '../services/facts.js';
import { logger } from '../lib/logger.js';
import { UnknownFactError } from '../lib/errors.js';
import { parse_or_reject } from './validate.js';
import {
  fact_id_param_schema,
  ingest_fact_schema,
  replace_fact_schema,
  list_facts_query_schema,
  topic_search_query_schema,
  forget_query_schema,
  forget_topic_query_schema,
  vote_schema,
  visibility_update_schema,
} from '../schemas/facts.js';

export function create_facts_router(engine: CurationEngine): Router {
  const router = Router();

  // Teach a new fact
  router.post('/facts', async (req, res, next) => {
    try {
      const body = parse_or_reject(ingest_fact_schema, req.body, req, res, 'facts/ingest');
      if (!body) return;

      const result = await engine.ingestion.ingest(body);
      if (result.status === 'duplicate') {
        res.status(409).json({
          error: result.error.message,
          existing_id: result.error.existing_id,
          similarity: result.error.similarity,
        });
        return;
      }

      logger.info('fact created', { request_id: req.request_id, fact_id: result.fact.id });
      res.status(201).json({ fact_id: result.fact.id, fact: to_summary(result.fact) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/facts', async (req, res, next) => {
    try {
      const params = parse_or_reject(list_facts_query_schema, req.query, req, res, 'facts/list');
      if (!params) return;

      if (params.topic) {
        const facts = await engine.store.find_by_topic(params.topic);
        res.json({ facts: facts.map(to_summary), next_cursor: null });
        return;
      }

      const result = await engine.store.list_facts({ limit: params.limit, cursor: params.cursor });
      res.json({ facts: result.facts.map(to_summary), next_cursor: result.next_cursor });
    } catch (err) {
      next(err);
    }
  });

  // Topic autocomplete
  router.get('/facts/topics', async (req, res, next) => {
    try {
      const params = parse_or_reject(topic_search_query_schema, req.query, req, res, 'facts/topics');
      if (!params) return;

      const topics = await engine.store.search_topics(params.q.trim(), params.limit);
      res.json({ topics });
    } catch (err) {
      next(err);
    }
  });

  router.get('/facts/:id', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/get');
      if (!params) return;

      const fact = await engine.store.get_fact(params.id);
      if (!fact) {
        throw new UnknownFactError(params.id);
      }
      const status = await engine.feedback.curation_status(fact);
      res.json({ fact: to_summary(fact), status });
    } catch (err) {
      next(err);
    }
  });

  // Edit: re-embeds and replaces the fact under a new id
  router.put('/facts/:id', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/replace');
      if (!params) return;
      const body = parse_or_reject(replace_fact_schema, req.body, req, res, 'facts/replace');
      if (!body) return;

      const result = await engine.ingestion.replace(params.id, body);
      if (result.status === 'duplicate') {
        res.status(409).json({
          error: result.error.message,
          existing_id: result.error.existing_id,
          similarity: result.error.similarity,
        });
        return;
      }

      logger.info('fact replaced', {
        request_id: req.request_id,
        fact_id: result.fact.id,
        replaced_id: result.replaced_id,
      });
      res.json({ fact_id: result.fact.id, replaced_id: result.replaced_id, fact: to_summary(result.fact) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/facts/:id', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/forget');
      if (!params) return;
      const query = parse_or_reject(forget_query_schema, req.query, req, res, 'facts/forget');
      if (!query) return;

      const fact = await engine.ingestion.forget(params.id, query.actor_id);
      res.json({ removed: [fact.id] });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/facts', async (req, res, next) => {
    try {
      const params = parse_or_reject(forget_topic_query_schema, req.query, req, res, 'facts/forget-topic');
      if (!params) return;

      const facts = await engine.ingestion.forget_topic(params.topic, params.actor_id);
      if (facts.length === 0) {
        res.status(404).json({ error: `No facts with topic "${params.topic}"` });
        return;
      }
      res.json({ removed: facts.map((f) => f.id) });
    } catch (err) {
      next(err);
    }
  });

  router.post('/facts/:id/vote', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/vote');
      if (!params) return;
      const body = parse_or_reject(vote_schema, req.body, req, res, 'facts/vote');
      if (!body) return;

      res.json(await engine.feedback.vote(params.id, body.direction));
    } catch (err) {
      next(err);
    }
  });

  router.post('/facts/:id/flag', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/flag');
      if (!params) return;

      res.json(await engine.feedback.flag(params.id));
    } catch (err) {
      next(err);
    }
  });

  router.post('/facts/:id/clear-flags', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/clear-flags');
      if (!params) return;

      const fact = await engine.feedback.clear_flags(params.id);
      res.json({ fact: to_summary(fact) });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/facts/:id/visibility', async (req, res, next) => {
    try {
      const params = parse_or_reject(fact_id_param_schema, req.params, req, res, 'facts/visibility');
      if (!params) return;
      const body = parse_or_reject(visibility_update_schema, req.body, req, res, 'facts/visibility');
      if (!body) return;

      const fact = await engine.feedback.set_visibility(params.id, body.visibility);
      res.json({ fact: to_summary(fact) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
