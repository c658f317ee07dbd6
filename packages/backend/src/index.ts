import { create_app } from './app.js';
import { config } from './config.js';
import { logger } from './lib/logger.js';
import { close_pool, query } from './db/index.js';
import { run_migrations } from './db/migrate.js';
import { create_embedding_gateway, gemini_embed, is_ai_available } from './services/ai/index.js';
import { create_pg_fact_store } from './services/facts.js';
import { create_pg_alias_store } from './services/aliases.js';
import { create_pg_config_store } from './services/config-store.js';
import {
  create_fanout_sink,
  create_log_sink,
  create_webhook_sink,
  type NotificationSink,
} from './services/notifications.js';
import { create_curation_engine } from './services/engine.js';

function build_notification_sink(): NotificationSink {
  const sinks: NotificationSink[] = [create_log_sink()];
  if (config.alert_webhook_url) {
    sinks.push(create_webhook_sink(config.alert_webhook_url, { timeout_ms: config.alert_timeout_ms }));
  }
  return create_fanout_sink(sinks);
}

async function main(): Promise<void> {
  await run_migrations();

  const engine = create_curation_engine({
    store: create_pg_fact_store(),
    aliases: create_pg_alias_store(),
    config_store: create_pg_config_store(),
    embeddings: create_embedding_gateway(gemini_embed, {
      dimensions: config.embedding_dimensions,
      timeout_ms: config.embedding_timeout_ms,
    }),
    notifications: build_notification_sink(),
    defaults: {
      confidence_threshold: config.confidence_threshold,
      duplicate_threshold: config.duplicate_threshold,
      flag_alert_threshold: config.flag_alert_threshold,
      retrieval_candidates: config.retrieval_candidates,
    },
  });

  const { indexed } = await engine.start();

  const app = create_app(engine, {
    check_database: async () => {
      await query('SELECT 1');
    },
  });

  const server = app.listen(config.port, () => {
    logger.info('server started', {
      port: config.port,
      node_env: config.node_env,
      indexed_facts: indexed,
      answer_composition: is_ai_available(),
    });
  });

  function shutdown(): void {
    logger.info('shutting down');
    server.close(() => {
      close_pool()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('pool shutdown failed', { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  }

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.error('startup failed', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
