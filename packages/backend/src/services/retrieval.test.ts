import { describe, it, expect } from 'vitest';
import { build_test_engine } from '../test/engine.js';
import { axis, vector_at } from '../test/fake-embeddings.js';
import { confidence_label, report_knowledge_gap } from './retrieval.js';
import { StorageUnavailableError, ValidationError } from '../lib/errors.js';

const FIRE_STATION = 'The fire station is at grid E4.';
const QUESTION = 'Where is the fire station?';

async function engine_with_fire_station(config_values: Record<string, string> = {}) {
  const built = build_test_engine(config_values);
  built.embedder.set(FIRE_STATION, axis(0));
  await built.engine.ingestion.ingest({ topic: 'fire station', content: FIRE_STATION });
  return built;
}

describe('retrieve', () => {
  it('reports a gap with no best match when the index is empty', async () => {
    const { engine } = build_test_engine();

    await expect(engine.retrieval.retrieve(QUESTION)).resolves.toEqual({
      kind: 'knowledge_gap',
      best_score: null,
      best_fact_id: null,
      query_text: QUESTION,
    });
  });

  it('answers with the best fact when it clears the confidence threshold', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    embedder.set(QUESTION, vector_at(0.85));

    const result = await engine.retrieval.retrieve(QUESTION);

    expect(result.kind).toBe('answered');
    if (result.kind !== 'answered') return;
    expect(result.fact_id).toBe(1);
    expect(result.content).toBe(FIRE_STATION);
    expect(result.topic).toBe('fire station');
    expect(result.visibility).toBe('public');
    expect(result.score).toBeCloseTo(0.85, 9);
    expect(result.candidates.map((c) => c.fact_id)).toEqual([1]);
  });

  it('reports a gap carrying the best score when below the threshold', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    embedder.set(QUESTION, vector_at(0.5));

    const result = await engine.retrieval.retrieve(QUESTION);

    expect(result.kind).toBe('knowledge_gap');
    if (result.kind !== 'knowledge_gap') return;
    expect(result.best_fact_id).toBe(1);
    expect(result.best_score).toBeCloseTo(0.5, 9);
  });

  it('reads the confidence threshold from config', async () => {
    const { engine, embedder } = await engine_with_fire_station({ confidence_threshold: '0.4' });
    embedder.set(QUESTION, vector_at(0.5));

    const result = await engine.retrieval.retrieve(QUESTION);

    expect(result.kind).toBe('answered');
  });

  it('retrieves a fact when asked its own content', async () => {
    const { engine } = build_test_engine();
    const content = 'Dragons can be slain with an anti-dragon shield.';
    await engine.ingestion.ingest({ topic: 'dragons', content });

    const result = await engine.retrieval.retrieve(content);

    expect(result.kind).toBe('answered');
    if (result.kind !== 'answered') return;
    expect(result.fact_id).toBe(1);
    expect(result.score).toBeCloseTo(1, 12);
  });

  it('rewrites alias triggers before embedding', async () => {
    const { engine, aliases, embedder } = await engine_with_fire_station();
    await aliases.set_alias('FS', 'fire station');
    embedder.set('where is the fire station?', vector_at(0.9));

    const result = await engine.retrieval.retrieve('  where is the  FS?');

    expect(result.query_text).toBe('where is the fire station?');
    expect(embedder.calls.at(-1)).toBe('where is the fire station?');
    expect(result.kind).toBe('answered');
  });

  it('lists confident candidates in score order', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    embedder
      .set('The fire station has two engines.', vector_at(0.9))
      .set('The bank is north of the square.', axis(3));
    await engine.ingestion.ingest({ topic: 'fire station', content: 'The fire station has two engines.' });
    await engine.ingestion.ingest({ topic: 'bank', content: 'The bank is north of the square.' });
    embedder.set(QUESTION, axis(0));

    const result = await engine.retrieval.retrieve(QUESTION);

    expect(result.kind).toBe('answered');
    if (result.kind !== 'answered') return;
    expect(result.candidates.map((c) => c.fact_id)).toEqual([1, 2]);
    expect(result.candidates[1]?.score).toBeCloseTo(0.9, 9);
  });

  it('returns the same result for the same question', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    embedder.set(QUESTION, vector_at(0.85));

    const first = await engine.retrieval.retrieve(QUESTION);
    const second = await engine.retrieval.retrieve(QUESTION);

    expect(second).toEqual(first);
  });

  it('skips indexed ids whose fact is no longer stored', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    engine.index.upsert(99, axis(2));
    embedder.set(QUESTION, axis(2));

    await expect(engine.retrieval.retrieve(QUESTION)).resolves.toEqual({
      kind: 'knowledge_gap',
      best_score: 0,
      best_fact_id: 1,
      query_text: QUESTION,
    });
  });

  it('answers from the best stored fact behind a missing one', async () => {
    const { engine, embedder } = await engine_with_fire_station();
    engine.index.upsert(99, vector_at(0.9));
    embedder.set(QUESTION, vector_at(0.9));

    const result = await engine.retrieval.retrieve(QUESTION);

    expect(result.kind).toBe('answered');
    if (result.kind !== 'answered') return;
    expect(result.fact_id).toBe(1);
    expect(result.score).toBeCloseTo(0.9, 9);
    expect(result.candidates.map((c) => c.fact_id)).toEqual([1]);
  });

  it('does not see a fact whose insert has not committed', async () => {
    const { engine, store, embedder } = build_test_engine();
    embedder.set(FIRE_STATION, axis(0)).set(QUESTION, axis(0));
    const hold = store.hold_next_commit();
    store.fail_next_commit = true;
    const empty = { kind: 'knowledge_gap', best_score: null, best_fact_id: null, query_text: QUESTION };

    const pending = engine.ingestion.ingest({ topic: 'fire station', content: FIRE_STATION });
    await hold.reached;
    await expect(engine.retrieval.retrieve(QUESTION)).resolves.toEqual(empty);

    hold.release();
    await expect(pending).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(engine.index.size).toBe(0);
    await expect(engine.retrieval.retrieve(QUESTION)).resolves.toEqual(empty);
  });

  it('keeps answering from a fact until its delete commits', async () => {
    const { engine, store, embedder } = await engine_with_fire_station();
    embedder.set(QUESTION, axis(0));
    const hold = store.hold_next_commit();

    const pending = engine.ingestion.forget(1);
    await hold.reached;
    const during = await engine.retrieval.retrieve(QUESTION);
    expect(during.kind === 'answered' ? during.fact_id : null).toBe(1);

    hold.release();
    await pending;
    await expect(engine.retrieval.retrieve(QUESTION)).resolves.toEqual({
      kind: 'knowledge_gap',
      best_score: null,
      best_fact_id: null,
      query_text: QUESTION,
    });
  });

  it('rejects an empty question', async () => {
    const { engine } = build_test_engine();

    await expect(engine.retrieval.retrieve(' \n ')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('confidence_label', () => {
  it.each([
    [0.9, 'high'],
    [0.45, 'high'],
    [0.44, 'medium'],
    [0.3, 'medium'],
    [0.29, 'low'],
  ])('labels %s as %s', (score, label) => {
    expect(confidence_label(score)).toBe(label);
  });
});

describe('report_knowledge_gap', () => {
  it('emits a knowledge gap event', async () => {
    const { sink } = build_test_engine();

    await report_knowledge_gap(sink, {
      kind: 'knowledge_gap',
      best_score: 0.42,
      best_fact_id: 3,
      query_text: 'who runs the shop?',
    });

    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({
      type: 'knowledge_gap',
      question: 'who runs the shop?',
      best_score: 0.42,
      best_fact_id: 3,
    });
  });
});
