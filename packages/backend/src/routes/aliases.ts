import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';
import { logger } from '../lib/logger.js';
import { parse_or_reject } from './validate.js';
import { alias_param_schema, set_alias_schema } from '../schemas/aliases.js';

export function create_aliases_router(engine: CurationEngine): Router {
  const router = Router();

  router.get('/aliases', async (_req, res, next) => {
    try {
      res.json({ aliases: await engine.aliases.list_aliases() });
    } catch (err) {
      next(err);
    }
  });

  router.get('/aliases/:trigger', async (req, res, next) => {
    try {
      const params = parse_or_reject(alias_param_schema, req.params, req, res, 'aliases/get');
      if (!params) return;

      const alias = await engine.aliases.get_alias(params.trigger);
      if (!alias) {
        res.status(404).json({ error: 'Alias not found' });
        return;
      }
      res.json({ alias });
    } catch (err) {
      next(err);
    }
  });

  router.put('/aliases/:trigger', async (req, res, next) => {
    try {
      const params = parse_or_reject(alias_param_schema, req.params, req, res, 'aliases/set');
      if (!params) return;
      const body = parse_or_reject(set_alias_schema, req.body, req, res, 'aliases/set');
      if (!body) return;

      const alias = await engine.aliases.set_alias(params.trigger, body.replacement);
      logger.info('alias set', { request_id: req.request_id, trigger: alias.trigger });
      res.json({ alias });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/aliases/:trigger', async (req, res, next) => {
    try {
      const params = parse_or_reject(alias_param_schema, req.params, req, res, 'aliases/delete');
      if (!params) return;

      const deleted = await engine.aliases.delete_alias(params.trigger);
      if (!deleted) {
        res.status(404).json({ error: 'Alias not found' });
        return;
      }
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
