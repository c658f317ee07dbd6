import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';
import { CONFIG_VALUE_SCHEMAS, is_config_key } from '../services/config-cache.js';
import { logger } from '../lib/logger.js';
import { parse_or_reject } from './validate.js';
import { config_param_schema, set_config_schema } from '../schemas/config.js';

// Admin writes go through here so that every write invalidates the cache
export function create_config_router(engine: CurationEngine): Router {
  const router = Router();

  router.get('/config', async (_req, res, next) => {
    try {
      const [entries, settings] = await Promise.all([
        engine.config_store.list_values(),
        engine.config.get_settings(),
      ]);
      res.json({ entries, settings });
    } catch (err) {
      next(err);
    }
  });

  router.put('/config/:key', async (req, res, next) => {
    try {
      const params = parse_or_reject(config_param_schema, req.params, req, res, 'config/set');
      if (!params) return;
      const body = parse_or_reject(set_config_schema, req.body, req, res, 'config/set');
      if (!body) return;

      if (is_config_key(params.key)) {
        const checked = parse_or_reject(CONFIG_VALUE_SCHEMAS[params.key], body.value, req, res, 'config/set');
        if (checked === null) return;
      }

      await engine.config_store.set_value(params.key, body.value);
      engine.config.invalidate(params.key);
      logger.info('config updated', { request_id: req.request_id, key: params.key, value: body.value });
      res.json({ key: params.key, value: body.value });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/config/:key', async (req, res, next) => {
    try {
      const params = parse_or_reject(config_param_schema, req.params, req, res, 'config/delete');
      if (!params) return;

      const deleted = await engine.config_store.delete_value(params.key);
      engine.config.invalidate(params.key);
      if (!deleted) {
        res.status(404).json({ error: 'Config key not found' });
        return;
      }
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.post('/config/reload', async (_req, res, next) => {
    try {
      engine.config.invalidate_all();
      res.json({ settings: await engine.config.get_settings() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
