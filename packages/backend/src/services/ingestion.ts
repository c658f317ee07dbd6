import type { Fact, FactChangeAction, FactId, Visibility } from '@curator/shared';
import type { FactStore, NewFact } from './facts.js';
import type { SimilarityIndex } from './index/similarity-index.js';
import type { EmbeddingGateway, EmbedOptions } from './ai/embeddings.js';
import type { ConfigCache } from './config-cache.js';
import type { NotificationSink } from './notifications.js';
import { create_mutex, type Mutex } from '../lib/mutex.js';
import { normalize_text } from '../lib/text.js';
import { DuplicateFactError, UnknownFactError, ValidationError, error_message } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ component: 'ingestion' });

export interface IngestInput {
  topic: string;
  content: string;
  visibility?: Visibility;
  author_id?: string | null;
  skip_duplicate_check?: boolean;
}

export interface ReplaceInput {
  topic: string;
  content: string;
  visibility?: Visibility;
  editor_id?: string | null;
}

export type IngestResult =
  | { status: 'created'; fact: Fact }
  | { status: 'duplicate'; error: DuplicateFactError };

export type ReplaceResult =
  | { status: 'replaced'; fact: Fact; replaced_id: FactId }
  | { status: 'duplicate'; error: DuplicateFactError };

export interface IngestionDeps {
  store: FactStore;
  index: SimilarityIndex;
  embeddings: EmbeddingGateway;
  config: ConfigCache;
  // Receives a fact_changed event after each committed write
  events?: NotificationSink;
  // Shared write lock; pass the same one to anything else that rewrites the index
  lock?: Mutex;
}

export interface IngestionPipeline {
  ingest(input: IngestInput, options?: EmbedOptions): Promise<IngestResult>;
  replace(fact_id: FactId, input: ReplaceInput, options?: EmbedOptions): Promise<ReplaceResult>;
  forget(fact_id: FactId, actor_id?: string | null): Promise<Fact>;
  forget_topic(topic: string, actor_id?: string | null): Promise<Fact[]>;
}

function require_text(field: string, value: string): string {
  const normalized = normalize_text(value);
  if (normalized.length === 0) {
    throw new ValidationError(`${field} must not be empty`);
  }
  return normalized;
}

/**
 * Writes facts to the store and the similarity index as one unit.
 *
 * All writes run under a single lock, so the duplicate probe and the insert
 * that follows it can never interleave with another write. Embedding happens
 * before the lock is taken. The index only changes once the store has
 * committed, so readers never see a fact the store does not have; the vector
 * is checked against the index before the transaction starts, so that
 * change cannot fail.
 */
export function create_ingestion_pipeline(deps: IngestionDeps): IngestionPipeline {
  const { store, index, embeddings, config, events } = deps;
  const lock = deps.lock ?? create_mutex();

  function find_duplicate(
    embedding: number[],
    threshold: number,
    exclude?: ReadonlySet<FactId>,
  ): DuplicateFactError | null {
    const match = index.find_at_or_above(embedding, threshold, exclude);
    return match ? new DuplicateFactError(match.id, match.score) : null;
  }

  // The write has already committed; a failed delivery is logged, never rethrown
  async function announce(
    action: FactChangeAction,
    fact: Fact,
    actor_id: string | null,
    previous_id: FactId | null = null,
  ): Promise<void> {
    if (!events) return;
    try {
      await events.emit({
        type: 'fact_changed',
        action,
        fact_id: fact.id,
        topic: fact.topic,
        actor_id,
        previous_id,
        occurred_at: new Date(),
      });
    } catch (error) {
      log.warn('fact change notification failed', { action, fact_id: fact.id, error: error_message(error) });
    }
  }

  async function ingest(input: IngestInput, options?: EmbedOptions): Promise<IngestResult> {
    const topic = require_text('topic', input.topic);
    const content = require_text('content', input.content);
    const embedding = await embeddings.embed(content, options);
    const author_id = input.author_id ?? null;

    const draft: NewFact = {
      topic,
      content,
      embedding,
      visibility: input.visibility ?? 'public',
      author_id,
    };

    const result = await lock.run(async (): Promise<IngestResult> => {
      index.assert_compatible(embedding);
      if (!input.skip_duplicate_check) {
        const threshold = await config.get_number('duplicate_threshold');
        const duplicate = find_duplicate(embedding, threshold);
        if (duplicate) {
          log.info('duplicate fact rejected', {
            topic,
            existing_id: duplicate.existing_id,
            similarity: duplicate.similarity,
          });
          return { status: 'duplicate', error: duplicate };
        }
      }

      const fact = await store.insert_fact(draft);
      index.upsert(fact.id, fact.embedding);
      log.info('fact ingested', { fact_id: fact.id, topic: fact.topic });
      return { status: 'created', fact };
    });

    if (result.status === 'created') {
      await announce('created', result.fact, author_id);
    }
    return result;
  }

  async function replace(fact_id: FactId, input: ReplaceInput, options?: EmbedOptions): Promise<ReplaceResult> {
    const topic = require_text('topic', input.topic);
    const content = require_text('content', input.content);
    const embedding = await embeddings.embed(content, options);
    const editor_id = input.editor_id ?? null;

    const result = await lock.run(async (): Promise<ReplaceResult> => {
      index.assert_compatible(embedding);
      const current = await store.get_fact(fact_id);
      if (!current) {
        throw new UnknownFactError(fact_id);
      }

      const threshold = await config.get_number('duplicate_threshold');
      const duplicate = find_duplicate(embedding, threshold, new Set([fact_id]));
      if (duplicate) {
        log.info('replacement rejected as duplicate', { fact_id, existing_id: duplicate.existing_id });
        return { status: 'duplicate', error: duplicate };
      }

      const { fact, replaced } = await store.replace_fact(fact_id, {
        topic,
        content,
        embedding,
        visibility: input.visibility ?? current.metadata.visibility,
        author_id: current.metadata.author_id,
        last_editor_id: editor_id,
      });
      index.upsert(fact.id, fact.embedding);
      index.remove(replaced.id);
      log.info('fact replaced', { fact_id: fact.id, replaced_id: fact_id });
      return { status: 'replaced', fact, replaced_id: fact_id };
    });

    if (result.status === 'replaced') {
      await announce('replaced', result.fact, editor_id, result.replaced_id);
    }
    return result;
  }

  async function forget(fact_id: FactId, actor_id: string | null = null): Promise<Fact> {
    const fact = await lock.run(async () => {
      const deleted = await store.delete_fact(fact_id);
      index.remove(deleted.id);
      log.info('fact forgotten', { fact_id });
      return deleted;
    });
    await announce('forgotten', fact, actor_id);
    return fact;
  }

  async function forget_topic(topic: string, actor_id: string | null = null): Promise<Fact[]> {
    const normalized = require_text('topic', topic);
    const facts = await lock.run(async () => {
      const deleted = await store.delete_facts_by_topic(normalized);
      for (const fact of deleted) {
        index.remove(fact.id);
      }
      log.info('topic forgotten', { topic: normalized, removed: deleted.length });
      return deleted;
    });
    for (const fact of facts) {
      await announce('forgotten', fact, actor_id);
    }
    return facts;
  }

  return { ingest, replace, forget, forget_topic };
}
