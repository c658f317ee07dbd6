import type { FactStore } from './facts.js';
import type { SimilarityIndex } from './index/similarity-index.js';
import type { Mutex } from '../lib/mutex.js';
import { logger } from '../lib/logger.js';

export interface RebuildResult {
  indexed: number;
  duration_ms: number;
}

/**
 * Repopulates the index from every stored embedding. Runs under the write
 * lock so no ingestion lands between the read and the swap.
 */
export function rebuild_index(store: FactStore, index: SimilarityIndex, lock: Mutex): Promise<RebuildResult> {
  return lock.run(async () => {
    const start = Date.now();
    const entries = await store.list_embeddings();
    const indexed = index.rebuild(entries);
    const duration_ms = Date.now() - start;
    logger.info('similarity index rebuilt', { indexed, duration_ms });
    return { indexed, duration_ms };
  });
}
