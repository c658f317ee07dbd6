import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';

export function create_maintenance_router(engine: CurationEngine): Router {
  const router = Router();

  router.post('/maintenance/rebuild-index', async (_req, res, next) => {
    try {
      res.json(await engine.rebuild_index());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
