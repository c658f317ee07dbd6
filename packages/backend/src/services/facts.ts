import type { Fact, FactId, FactSummary, Visibility, VoteCounts, VoteDirection } from '@curator/shared';
import { query, with_transaction, client_query, type DbClient } from '../db/index.js';
import { UnknownFactError } from '../lib/errors.js';
import type { IndexEntry } from './index/similarity-index.js';

export interface NewFact {
  topic: string;
  content: string;
  embedding: number[];
  visibility: Visibility;
  author_id: string | null;
  last_editor_id?: string | null;
  upvotes?: number;
  downvotes?: number;
  flag_count?: number;
}

export interface ReplaceOutcome {
  fact: Fact;
  replaced: Fact;
}

export interface ListFactsParams {
  limit: number;
  cursor?: FactId;
}

export interface ListFactsResponse {
  facts: Fact[];
  next_cursor: FactId | null;
}

export interface FlagIncrement {
  fact_id: FactId;
  topic: string;
  flag_count: number;
}

export interface FactStore {
  insert_fact(input: NewFact): Promise<Fact>;
  // Inserts the new row and deletes the old one in a single transaction
  replace_fact(id: FactId, input: NewFact): Promise<ReplaceOutcome>;
  delete_fact(id: FactId): Promise<Fact>;
  delete_facts_by_topic(topic: string): Promise<Fact[]>;
  get_fact(id: FactId): Promise<Fact | null>;
  get_facts(ids: FactId[]): Promise<Fact[]>;
  list_facts(params: ListFactsParams): Promise<ListFactsResponse>;
  find_by_topic(topic: string): Promise<Fact[]>;
  search_topics(prefix: string, limit: number): Promise<string[]>;
  list_embeddings(): Promise<IndexEntry[]>;
  increment_vote(id: FactId, direction: VoteDirection): Promise<VoteCounts | null>;
  increment_flag(id: FactId): Promise<FlagIncrement | null>;
  reset_flags(id: FactId): Promise<Fact | null>;
  set_visibility(id: FactId, visibility: Visibility): Promise<Fact | null>;
}

export interface FactRow {
  id: string | number;
  topic: string;
  content: string;
  embedding: number[];
  upvotes: number;
  downvotes: number;
  flag_count: number;
  visibility: Visibility;
  author_id: string | null;
  last_editor_id: string | null;
  created_at: Date;
}

const FACT_COLUMNS =
  'id, topic, content, embedding, upvotes, downvotes, flag_count, visibility, author_id, last_editor_id, created_at';

// BIGSERIAL ids arrive as strings from pg
export function row_to_fact(row: FactRow): Fact {
  return {
    id: Number(row.id),
    topic: row.topic,
    content: row.content,
    embedding: row.embedding.map(Number),
    metadata: {
      upvotes: row.upvotes,
      downvotes: row.downvotes,
      flag_count: row.flag_count,
      visibility: row.visibility,
      author_id: row.author_id,
      last_editor_id: row.last_editor_id,
    },
    created_at: row.created_at,
  };
}

export function to_summary(fact: Fact): FactSummary {
  return {
    id: fact.id,
    topic: fact.topic,
    content: fact.content,
    metadata: fact.metadata,
    created_at: fact.created_at,
  };
}

async function insert_row(client: DbClient, input: NewFact): Promise<Fact> {
  const result = await client_query<FactRow>(
    client,
    `INSERT INTO facts (
      topic, content, embedding, visibility, author_id, last_editor_id,
      upvotes, downvotes, flag_count, created_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
    RETURNING ${FACT_COLUMNS}`,
    [
      input.topic,
      input.content,
      input.embedding,
      input.visibility,
      input.author_id,
      input.last_editor_id ?? null,
      input.upvotes ?? 0,
      input.downvotes ?? 0,
      input.flag_count ?? 0,
    ]
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error('insert_fact: insert returned no rows');
  }
  return row_to_fact(row);
}

export function create_pg_fact_store(): FactStore {
  return {
    insert_fact(input) {
      return with_transaction((client) => insert_row(client, input));
    },

    replace_fact(id, input) {
      return with_transaction(async (client) => {
        const current = await client_query<FactRow>(
          client,
          `SELECT ${FACT_COLUMNS} FROM facts WHERE id = $1 FOR UPDATE`,
          [id]
        );
        const current_row = current.rows[0];
        if (!current_row) {
          throw new UnknownFactError(id);
        }
        const replaced = row_to_fact(current_row);

        const fact = await insert_row(client, {
          ...input,
          author_id: replaced.metadata.author_id ?? input.author_id,
          upvotes: replaced.metadata.upvotes,
          downvotes: replaced.metadata.downvotes,
          flag_count: replaced.metadata.flag_count,
        });
        await client_query(client, 'DELETE FROM facts WHERE id = $1', [id]);

        return { fact, replaced };
      });
    },

    delete_fact(id) {
      return with_transaction(async (client) => {
        const result = await client_query<FactRow>(
          client,
          `DELETE FROM facts WHERE id = $1 RETURNING ${FACT_COLUMNS}`,
          [id]
        );
        const row = result.rows[0];
        if (!row) {
          throw new UnknownFactError(id);
        }
        return row_to_fact(row);
      });
    },

    delete_facts_by_topic(topic) {
      return with_transaction(async (client) => {
        const result = await client_query<FactRow>(
          client,
          `DELETE FROM facts WHERE lower(topic) = lower($1) RETURNING ${FACT_COLUMNS}`,
          [topic]
        );
        return result.rows.map(row_to_fact).sort((a, b) => a.id - b.id);
      });
    },

    async get_fact(id) {
      const result = await query<FactRow>(`SELECT ${FACT_COLUMNS} FROM facts WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? row_to_fact(row) : null;
    },

    async get_facts(ids) {
      if (ids.length === 0) return [];
      const result = await query<FactRow>(
        `SELECT ${FACT_COLUMNS} FROM facts WHERE id = ANY($1::bigint[]) ORDER BY id`,
        [ids]
      );
      return result.rows.map(row_to_fact);
    },

    async list_facts(params) {
      const values: unknown[] = [];
      let param_index = 1;
      const conditions: string[] = [];

      if (params.cursor !== undefined) {
        values.push(params.cursor);
        conditions.push(`id < $${param_index++}`);
      }

      values.push(params.limit + 1);

      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      const result = await query<FactRow>(
        `SELECT ${FACT_COLUMNS} FROM facts ${where} ORDER BY id DESC LIMIT $${param_index}`,
        values
      );

      const has_more = result.rows.length > params.limit;
      const facts = (has_more ? result.rows.slice(0, -1) : result.rows).map(row_to_fact);
      const last = facts[facts.length - 1];
      return { facts, next_cursor: has_more && last ? last.id : null };
    },

    async find_by_topic(topic) {
      const result = await query<FactRow>(
        `SELECT ${FACT_COLUMNS} FROM facts WHERE lower(topic) = lower($1) ORDER BY id`,
        [topic]
      );
      return result.rows.map(row_to_fact);
    },

    async search_topics(prefix, limit) {
      const result = prefix
        ? await query<{ topic: string }>(
            `SELECT DISTINCT topic FROM facts WHERE topic ILIKE $1 ORDER BY topic LIMIT $2`,
            [`%${prefix}%`, limit]
          )
        : await query<{ topic: string }>(
            `SELECT topic FROM (
               SELECT topic, MAX(id) AS latest FROM facts GROUP BY topic
             ) t ORDER BY latest DESC LIMIT $1`,
            [limit]
          );
      return result.rows.map((row) => row.topic);
    },

    async list_embeddings() {
      const result = await query<{ id: string | number; embedding: number[] }>(
        'SELECT id, embedding FROM facts ORDER BY id'
      );
      return result.rows.map((row) => ({ id: Number(row.id), embedding: row.embedding.map(Number) }));
    },

    async increment_vote(id, direction) {
      const column = direction === 'up' ? 'upvotes' : 'downvotes';
      const result = await query<{ id: string | number; upvotes: number; downvotes: number }>(
        `UPDATE facts SET ${column} = ${column} + 1 WHERE id = $1 RETURNING id, upvotes, downvotes`,
        [id]
      );
      const row = result.rows[0];
      return row ? { fact_id: Number(row.id), upvotes: row.upvotes, downvotes: row.downvotes } : null;
    },

    async increment_flag(id) {
      const result = await query<{ id: string | number; topic: string; flag_count: number }>(
        'UPDATE facts SET flag_count = flag_count + 1 WHERE id = $1 RETURNING id, topic, flag_count',
        [id]
      );
      const row = result.rows[0];
      return row ? { fact_id: Number(row.id), topic: row.topic, flag_count: row.flag_count } : null;
    },

    async reset_flags(id) {
      const result = await query<FactRow>(
        `UPDATE facts SET flag_count = 0 WHERE id = $1 RETURNING ${FACT_COLUMNS}`,
        [id]
      );
      const row = result.rows[0];
      return row ? row_to_fact(row) : null;
    },

    async set_visibility(id, visibility) {
      const result = await query<FactRow>(
        `UPDATE facts SET visibility = $2 WHERE id = $1 RETURNING ${FACT_COLUMNS}`,
        [id, visibility]
      );
      const row = result.rows[0];
      return row ? row_to_fact(row) : null;
    },
  };
}
