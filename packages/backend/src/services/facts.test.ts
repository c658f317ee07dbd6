import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../db/index.js', () => ({
  query: vi.fn(),
  client_query: vi.fn(),
  with_transaction: vi.fn(),
}));

import pg from 'pg';
import { query, client_query, with_transaction } from '../db/index.js';
import { create_pg_fact_store, row_to_fact, type FactRow, type NewFact } from './facts.js';
import { UnknownFactError } from '../lib/errors.js';

const mock_query = vi.mocked(query);
const mock_client_query = vi.mocked(client_query);
const mock_with_transaction = vi.mocked(with_transaction);

const client = Object.assign(new pg.Client(), { release: vi.fn() });

function result<R extends pg.QueryResultRow>(rows: R[], command = 'SELECT'): pg.QueryResult<R> {
  return { rows, rowCount: rows.length, command, oid: 0, fields: [] };
}

function make_row(overrides: Partial<FactRow> = {}): FactRow {
  return {
    id: '7',
    topic: 'fire station',
    content: 'The fire station is at grid E4.',
    embedding: [1, 0],
    upvotes: 2,
    downvotes: 0,
    flag_count: 1,
    visibility: 'public',
    author_id: 'editor-1',
    last_editor_id: null,
    created_at: new Date('2024-03-01T00:00:00Z'),
    ...overrides,
  };
}

const new_fact: NewFact = {
  topic: 'fire station',
  content: 'The fire station is at grid E4.',
  embedding: [1, 0],
  visibility: 'public',
  author_id: 'editor-1',
};

beforeEach(() => {
  vi.clearAllMocks();
  mock_with_transaction.mockImplementation((fn) => fn(client));
});

describe('row_to_fact', () => {
  it('converts the bigint id and nests counters under metadata', () => {
    expect(row_to_fact(make_row())).toEqual({
      id: 7,
      topic: 'fire station',
      content: 'The fire station is at grid E4.',
      embedding: [1, 0],
      metadata: {
        upvotes: 2,
        downvotes: 0,
        flag_count: 1,
        visibility: 'public',
        author_id: 'editor-1',
        last_editor_id: null,
      },
      created_at: new Date('2024-03-01T00:00:00Z'),
    });
  });
});

describe('create_pg_fact_store', () => {
  const store = create_pg_fact_store();

  it('runs the commit hook inside the insert transaction', async () => {
    mock_client_query.mockResolvedValueOnce(result([make_row({ upvotes: 0, flag_count: 0 })], 'INSERT'));
    const hook = vi.fn();

    const fact = await store.insert_fact(new_fact, hook);

    expect(mock_with_transaction).toHaveBeenCalledTimes(1);
    expect(hook).toHaveBeenCalledWith(fact);
    expect(fact.id).toBe(7);
    expect(mock_client_query.mock.calls[0]?.[2]).toEqual([
      'fire station',
      'The fire station is at grid E4.',
      [1, 0],
      'public',
      'editor-1',
      null,
      0,
      0,
      0,
    ]);
  });

  it('propagates a failing commit hook', async () => {
    mock_client_query.mockResolvedValueOnce(result([make_row()], 'INSERT'));

    await expect(
      store.insert_fact(new_fact, () => {
        throw new Error('index full');
      }),
    ).rejects.toThrow('index full');
  });

  it('replaces a fact under a new id, carrying its counters', async () => {
    mock_client_query
      .mockResolvedValueOnce(result([make_row()]))
      .mockResolvedValueOnce(result([make_row({ id: '8', content: 'Moved to F2.' })], 'INSERT'))
      .mockResolvedValueOnce(result([], 'DELETE'));

    const outcome = await store.replace_fact(7, {
      ...new_fact,
      content: 'Moved to F2.',
      author_id: null,
      last_editor_id: 'editor-2',
    });

    expect(outcome.fact.id).toBe(8);
    expect(outcome.replaced.id).toBe(7);
    expect(mock_client_query.mock.calls[0]?.[1]).toContain('FOR UPDATE');
    expect(mock_client_query.mock.calls[1]?.[2]).toEqual([
      'fire station',
      'Moved to F2.',
      [1, 0],
      'public',
      'editor-1',
      'editor-2',
      2,
      0,
      1,
    ]);
    expect(mock_client_query.mock.calls[2]?.slice(1)).toEqual(['DELETE FROM facts WHERE id = $1', [7]]);
  });

  it('throws UnknownFactError when replacing a missing fact', async () => {
    mock_client_query.mockResolvedValueOnce(result([]));

    await expect(store.replace_fact(7, new_fact)).rejects.toBeInstanceOf(UnknownFactError);
    expect(mock_client_query).toHaveBeenCalledTimes(1);
  });

  it('throws UnknownFactError when deleting a missing fact', async () => {
    mock_client_query.mockResolvedValueOnce(result([], 'DELETE'));

    await expect(store.delete_fact(3)).rejects.toBeInstanceOf(UnknownFactError);
  });

  it('skips the query for an empty id list', async () => {
    await expect(store.get_facts([])).resolves.toEqual([]);
    expect(mock_query).not.toHaveBeenCalled();
  });

  it('increments the chosen vote column atomically', async () => {
    mock_query.mockResolvedValueOnce(result([{ id: '7', upvotes: 2, downvotes: 1 }], 'UPDATE'));

    await expect(store.increment_vote(7, 'down')).resolves.toEqual({ fact_id: 7, upvotes: 2, downvotes: 1 });
    expect(mock_query.mock.calls[0]?.[0]).toBe(
      'UPDATE facts SET downvotes = downvotes + 1 WHERE id = $1 RETURNING id, upvotes, downvotes',
    );
  });

  it('returns null when incrementing a missing fact', async () => {
    mock_query.mockResolvedValueOnce(result([], 'UPDATE'));

    await expect(store.increment_flag(7)).resolves.toBeNull();
  });

  it('pages facts newest first with a cursor', async () => {
    mock_query.mockResolvedValueOnce(
      result([make_row({ id: '6' }), make_row({ id: '5' }), make_row({ id: '4' })]),
    );

    const page = await store.list_facts({ limit: 2, cursor: 7 });

    expect(page.facts.map((f) => f.id)).toEqual([6, 5]);
    expect(page.next_cursor).toBe(5);
    expect(mock_query.mock.calls[0]?.[1]).toEqual([7, 3]);
  });
});
