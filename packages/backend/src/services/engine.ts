import type { FactStore } from './facts.js';
import type { AliasStore } from './aliases.js';
import type { ConfigStore } from './config-store.js';
import type { EmbeddingGateway } from './ai/embeddings.js';
import type { NotificationSink } from './notifications.js';
import { SimilarityIndex } from './index/similarity-index.js';
import { ConfigCache, type EngineSettings } from './config-cache.js';
import { create_ingestion_pipeline, type IngestionPipeline } from './ingestion.js';
import { create_retrieval_router, type RetrievalRouter } from './retrieval.js';
import { create_feedback_engine, type FeedbackEngine } from './feedback.js';
import { rebuild_index, type RebuildResult } from './maintenance.js';
import { create_mutex } from '../lib/mutex.js';

export interface EngineDeps {
  store: FactStore;
  aliases: AliasStore;
  config_store: ConfigStore;
  embeddings: EmbeddingGateway;
  notifications: NotificationSink;
  defaults: EngineSettings;
}

export interface CurationEngine {
  store: FactStore;
  aliases: AliasStore;
  config_store: ConfigStore;
  config: ConfigCache;
  index: SimilarityIndex;
  notifications: NotificationSink;
  ingestion: IngestionPipeline;
  retrieval: RetrievalRouter;
  feedback: FeedbackEngine;
  rebuild_index(): Promise<RebuildResult>;
  // Loads config and rebuilds the index from storage; call once before serving
  start(): Promise<RebuildResult>;
}

export function create_curation_engine(deps: EngineDeps): CurationEngine {
  const index = new SimilarityIndex(deps.embeddings.dimensions);
  const config = new ConfigCache(deps.config_store, deps.defaults);
  const write_lock = create_mutex();

  const ingestion = create_ingestion_pipeline({
    store: deps.store,
    index,
    embeddings: deps.embeddings,
    config,
    events: deps.notifications,
    lock: write_lock,
  });
  const retrieval = create_retrieval_router({
    store: deps.store,
    index,
    embeddings: deps.embeddings,
    aliases: deps.aliases,
    config,
  });
  const feedback = create_feedback_engine({ store: deps.store, config, alerts: deps.notifications });

  return {
    store: deps.store,
    aliases: deps.aliases,
    config_store: deps.config_store,
    config,
    index,
    notifications: deps.notifications,
    ingestion,
    retrieval,
    feedback,
    rebuild_index: () => rebuild_index(deps.store, index, write_lock),
    async start() {
      await config.preload();
      return rebuild_index(deps.store, index, write_lock);
    },
  };
}
