import express from 'express';
import { logging_middleware } from './middleware/logging.js';
import { error_middleware } from './middleware/error.js';
import type { CurationEngine } from './services/engine.js';
import { create_health_router, type HealthCheck } from './routes/health.js';
import { create_facts_router } from './routes/facts.js';
import { create_ask_router, type AnswerComposer } from './routes/ask.js';
import { create_aliases_router } from './routes/aliases.js';
import { create_config_router } from './routes/config.js';
import { create_maintenance_router } from './routes/maintenance.js';

export interface AppOptions {
  check_database: HealthCheck;
  composer?: AnswerComposer;
}

export function create_app(engine: CurationEngine, options: AppOptions): express.Application {
  const app = express();

  app.use(express.json());
  app.use(logging_middleware);

  app.use('/api', create_health_router(engine, options.check_database));

  // Knowledge
  app.use('/api', create_facts_router(engine));
  app.use('/api', create_ask_router(engine, options.composer));

  // Admin
  app.use('/api', create_aliases_router(engine));
  app.use('/api', create_config_router(engine));
  app.use('/api', create_maintenance_router(engine));

  app.use(error_middleware);

  return app;
}
