import type {
  ConfidenceLabel,
  KnowledgeGap,
  RetrievalCandidate,
  RetrievalResult,
} from '@curator/shared';
import type { FactStore } from './facts.js';
import type { SimilarityIndex } from './index/similarity-index.js';
import type { EmbeddingGateway, EmbedOptions } from './ai/embeddings.js';
import type { AliasStore } from './aliases.js';
import type { ConfigCache } from './config-cache.js';
import type { NotificationSink } from './notifications.js';
import { apply_aliases } from './aliases.js';
import { normalize_text } from '../lib/text.js';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ component: 'retrieval' });

export interface RetrievalDeps {
  store: FactStore;
  index: SimilarityIndex;
  embeddings: EmbeddingGateway;
  aliases: AliasStore;
  config: ConfigCache;
}

export interface RetrievalRouter {
  retrieve(question: string, options?: EmbedOptions): Promise<RetrievalResult>;
}

// Display buckets for a similarity score
export function confidence_label(score: number): ConfidenceLabel {
  if (score >= 0.45) return 'high';
  if (score >= 0.3) return 'medium';
  return 'low';
}

/**
 * Routes a question to an answer or a knowledge gap. Reads only: the same
 * question against the same index state always takes the same branch and
 * references the same fact.
 */
export function create_retrieval_router(deps: RetrievalDeps): RetrievalRouter {
  const { store, index, embeddings, aliases, config } = deps;

  async function retrieve(question: string, options?: EmbedOptions): Promise<RetrievalResult> {
    const normalized = normalize_text(question);
    if (normalized.length === 0) {
      throw new ValidationError('question must not be empty');
    }

    const query_text = apply_aliases(normalized, await aliases.list_aliases());
    const embedding = await embeddings.embed(query_text, options);

    const [threshold, candidate_limit] = await Promise.all([
      config.get_number('confidence_threshold'),
      config.get_number('retrieval_candidates'),
    ]);

    // The index can briefly hold an id whose delete has committed; such hits are dropped
    const hits = index.query(embedding, Math.max(1, candidate_limit));
    const facts = new Map((await store.get_facts(hits.map((hit) => hit.id))).map((f) => [f.id, f]));
    const live = hits.filter((hit) => facts.has(hit.id));
    const best = live[0];

    if (!best || best.score < threshold) {
      const gap: KnowledgeGap = {
        kind: 'knowledge_gap',
        best_score: best ? best.score : null,
        best_fact_id: best ? best.id : null,
        query_text,
      };
      log.info('knowledge gap', { query_text, best_score: gap.best_score, threshold });
      return gap;
    }

    const candidates: RetrievalCandidate[] = [];
    for (const hit of live) {
      const fact = facts.get(hit.id);
      if (!fact || hit.score < threshold) continue;
      candidates.push({
        fact_id: fact.id,
        topic: fact.topic,
        content: fact.content,
        visibility: fact.metadata.visibility,
        score: hit.score,
      });
    }

    const top = candidates[0];
    if (!top) {
      return { kind: 'knowledge_gap', best_score: best.score, best_fact_id: best.id, query_text };
    }

    log.debug('question answered', { fact_id: top.fact_id, score: top.score });
    return {
      kind: 'answered',
      fact_id: top.fact_id,
      topic: top.topic,
      content: top.content,
      visibility: top.visibility,
      score: top.score,
      candidates,
      query_text,
    };
  }

  return { retrieve };
}

export async function report_knowledge_gap(sink: NotificationSink, gap: KnowledgeGap): Promise<void> {
  await sink.emit({
    type: 'knowledge_gap',
    question: gap.query_text,
    best_score: gap.best_score,
    best_fact_id: gap.best_fact_id,
    occurred_at: new Date(),
  });
}
