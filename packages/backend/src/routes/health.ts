import { Router } from 'express';
import type { CurationEngine } from '../services/engine.js';

export type HealthCheck = () => Promise<void>;

export function create_health_router(engine: CurationEngine, check_database: HealthCheck): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      await check_database();
      res.json({ status: 'ok', database: 'connected', indexed_facts: engine.index.size });
    } catch {
      res.status(503).json({ status: 'error', database: 'disconnected' });
    }
  });

  return router;
}
